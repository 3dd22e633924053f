/**
 * HTML helpers shared by the report compiler and chapter formatters.
 */

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

/** Navigation anchor for a chapter title: "App System Metadata" -> "app-system-metadata" */
export function anchorFor(title: string): string {
  return title.trim().toLowerCase().replace(/\s+/g, '-');
}

/** Render any diagnostics value as display text */
export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  if (value === null || value === undefined) return String(value);
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

export function preformatted(text: string, className?: string): string {
  const cls = className ? ` class="${className}"` : '';
  return `<pre${cls}>${escapeHtml(text)}</pre>`;
}

export function keyValueTable(entries: Record<string, unknown>): string {
  const rows = Object.entries(entries)
    .map(([key, value]) => `<tr><th>${escapeHtml(key)}</th><td>${escapeHtml(stringifyValue(value))}</td></tr>`)
    .join('');
  return `<table>${rows}</table>`;
}

export const REPORT_STYLE = `<style>
body{font-family:system-ui,-apple-system,"Segoe UI",Roboto,Helvetica,Arial,sans-serif;font-size:1em;line-height:1.3em;margin:50px 50px 20px;color:#17181a}
h1{margin:10px 0 20px;font-weight:400}
h3{font-weight:400;font-size:20px;margin:0 0 10px}
pre{overflow:auto;font-size:13px;white-space:pre-wrap}
pre .error,pre.error{color:#b00020}
pre .system,pre.system{color:#555}
.container{display:flex;justify-content:space-between;flex-direction:row-reverse;max-width:960px;margin:0 auto}
.main-content{width:calc(100% - 190px)}
.nav-container{width:180px}
.nav-container nav{position:fixed}
.nav-container nav ul{margin:0;padding:0}
.nav-container nav ul li{margin-bottom:5px;display:block}
.nav-container nav ul li a{font-size:14px;color:#444;text-decoration:none}
.nav-container nav ul li a:hover{color:#000;text-decoration:underline}
.chapter{position:relative;margin-bottom:20px;padding-bottom:20px;border-bottom:1px solid #ccc}
.chapter:last-child{border-bottom:0}
.chapter .anchor{position:absolute;top:-20px}
table th{text-align:left;padding:0 5px 0 0;font-weight:500}
table td,table th{font-size:14px;vertical-align:top}
footer{text-align:center;font-size:14px}
@media(max-width:768px){body{margin:20px}.container{margin:0}.main-content{width:100%}.nav-container{display:none}}
@media(prefers-color-scheme:dark){body{background:#111;color:#f7f7f7}.chapter{border-bottom-color:rgba(255,255,255,.3)}.nav-container nav ul li a{color:rgba(255,255,255,.6)}.nav-container nav ul li a:hover{color:#fff}}
</style>`;
