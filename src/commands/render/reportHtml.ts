import type { DiagnosticAggregate, DiagnosticRecord } from "../../diagnostics/types";

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");
}

const EMPTY_CHECK_LABEL = "—";

const REPORT_STYLE = [
  ":root{--bg:#0b0d10;--fg:#e6edf3;--muted:#9aa7b1;--row:#11151a;--warn:#f5a623;--err:#ff4d4f}",
  "body{background:var(--bg);color:var(--fg);font:14px/1.45 ui-sans-serif,system-ui,sans-serif;margin:24px}",
  "h1{margin:0 0 16px 0;font-size:22px} h2{font-size:18px;margin:28px 0 10px 0}",
  ".muted{color:var(--muted)}",
  ".chips{display:flex;gap:8px;flex-wrap:wrap;margin:6px 0 16px 0}",
  ".chip{background:#1a2129;border:1px solid #223041;padding:4px 10px;border-radius:999px;font-size:12px}",
  ".filters{display:flex;gap:12px;margin:14px 0 18px 0;align-items:center}",
  "select,input[type=search]{background:#0f141a;color:var(--fg);border:1px solid #223041;padding:6px 10px;border-radius:8px}",
  "table{width:100%;border-collapse:collapse}",
  "th,td{text-align:left;padding:10px 8px;border-bottom:1px solid #1f2630}",
  "tr{background:var(--row)} tr:hover{background:#141a22}",
  "th{position:sticky;top:0;background:#0e141b}",
  "code{background:#0f141a;padding:2px 6px;border-radius:6px}",
  ".sev-warning{color:var(--warn)} .sev-error{color:var(--err)}",
  ".footer{margin-top:18px;font-size:12px} .nowrap{white-space:nowrap}"
].join("\n");

const FILTER_SCRIPT = [
  "(() => {",
  "  const sev = document.getElementById('sev');",
  "  const chk = document.getElementById('check');",
  "  const q = document.getElementById('q');",
  "  const rows = Array.from(document.querySelectorAll('#tbl tbody tr[data-sev]'));",
  "  function matches(row) {",
  "    const text = q.value.toLowerCase().trim();",
  "    if (sev.value && row.dataset.sev !== sev.value) return false;",
  "    if (chk.value && row.dataset.check !== chk.value) return false;",
  "    if (text && !(row.dataset.file + ' ' + row.dataset.msg).toLowerCase().includes(text)) return false;",
  "    return true;",
  "  }",
  "  function apply() {",
  "    let any = false;",
  "    rows.forEach((row) => { const ok = matches(row); row.style.display = ok ? '' : 'none'; if (ok) any = true; });",
  "    document.getElementById('empty')?.remove();",
  "    if (!any) {",
  "      const tr = document.createElement('tr');",
  "      tr.id = 'empty';",
  "      tr.innerHTML = '<td colspan=\"5\" class=\"muted\">No rows match.</td>';",
  "      document.querySelector('#tbl tbody').appendChild(tr);",
  "    }",
  "  }",
  "  [sev, chk].forEach((el) => el.addEventListener('change', apply));",
  "  q.addEventListener('input', apply);",
  "})();"
].join("\n");

function checkLabel(check: string): string {
  return check ? escapeHtml(check) : EMPTY_CHECK_LABEL;
}

function renderRow(record: DiagnosticRecord): string {
  return [
    `<tr data-sev="${record.severity}" data-check="${escapeHtml(record.check)}" data-file="${escapeHtml(record.path)}" data-msg="${escapeHtml(record.message)}">`,
    `<td class="sev-${record.severity}">${record.severity}</td>`,
    `<td><code>${checkLabel(record.check)}</code></td>`,
    `<td>${escapeHtml(record.message)}</td>`,
    `<td class="nowrap">${escapeHtml(record.path)}</td>`,
    `<td class="nowrap">${record.line}:${record.column}</td>`,
    "</tr>"
  ].join("");
}

function renderChip(label: string, value: number, className?: string): string {
  const title = className ? `<span class="${className}"><strong>${label}</strong></span>` : `<strong>${label}</strong>`;
  return `<div class="chip">${title} ${value}</div>`;
}

export function renderReportHtml(aggregate: DiagnosticAggregate, options: { title?: string } = {}): string {
  const title = escapeHtml(options.title ?? "Clang-Tidy Report");
  const lines: string[] = [];

  lines.push("<!doctype html>");
  lines.push('<html lang="en"><head>');
  lines.push('<meta charset="utf-8"><meta name="viewport" content="width=device-width, initial-scale=1">');
  lines.push(`<title>${title}</title>`);
  lines.push(`<style>\n${REPORT_STYLE}\n</style>`);
  lines.push("</head><body>");
  lines.push(`<h1>${title}</h1>`);

  lines.push('<div class="chips">');
  lines.push(renderChip("Total", aggregate.total));
  lines.push(renderChip("Errors", aggregate.severityCounts.error, "sev-error"));
  lines.push(renderChip("Warnings", aggregate.severityCounts.warning, "sev-warning"));
  lines.push(renderChip("Files", aggregate.files.length));
  lines.push(renderChip("Checks", aggregate.checksCount));
  lines.push("</div>");

  lines.push('<div class="filters">');
  lines.push('<label>Severity: <select id="sev"><option value="">All</option><option value="error">Error</option><option value="warning">Warning</option></select></label>');
  lines.push('<label>Check: <select id="check"><option value="">All</option>');
  for (const group of aggregate.checkGroups) {
    if (!group.check) {
      continue;
    }

    lines.push(`<option value="${escapeHtml(group.check)}">${escapeHtml(group.check)} (${group.count})</option>`);
  }
  lines.push("</select></label>");
  lines.push('<label class="nowrap">Search: <input id="q" type="search" placeholder="file / message contains"></label>');
  lines.push("</div>");

  lines.push('<table id="tbl">');
  lines.push('<thead><tr><th class="nowrap">Severity</th><th>Check</th><th>Message</th><th>File</th><th class="nowrap">Line:Col</th></tr></thead>');
  lines.push("<tbody>");
  for (const record of aggregate.records) {
    lines.push(renderRow(record));
  }
  if (aggregate.records.length === 0) {
    lines.push('<tr id="empty"><td colspan="5" class="muted">No diagnostics.</td></tr>');
  }
  lines.push("</tbody>");
  lines.push("</table>");

  lines.push("<h2>By Check</h2>");
  lines.push("<table>");
  lines.push("<thead><tr><th>Check</th><th>Count</th><th>Examples</th></tr></thead>");
  lines.push("<tbody>");
  for (const group of aggregate.checkGroups) {
    const examples = group.examples
      .map((record) => `<div><span class="nowrap">${escapeHtml(record.path)}:${record.line}</span> ${escapeHtml(record.message)}</div>`)
      .join("");
    lines.push(`<tr><td><code>${checkLabel(group.check)}</code></td><td>${group.count}</td><td>${examples}</td></tr>`);
  }
  if (aggregate.checkGroups.length === 0) {
    lines.push('<tr><td colspan="3" class="muted">No diagnostics.</td></tr>');
  }
  lines.push("</tbody>");
  lines.push("</table>");

  lines.push('<div class="footer muted">Generated from clang-tidy logs</div>');
  lines.push(`<script>\n${FILTER_SCRIPT}\n</script>`);
  lines.push("</body></html>");

  return `${lines.join("\n")}\n`;
}
