/**
 * Shared styles and HTML shell for view templates
 */

/**
 * Escape HTML special characters to prevent XSS
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function baseStyles(): string {
  return `
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: system-ui, -apple-system, "Segoe UI", Roboto, sans-serif;
           line-height: 1.6; color: #1f2937; background: #f3f4f6; padding: 40px 20px; }
    .card { background: white; border-radius: 12px; box-shadow: 0 2px 8px rgba(0,0,0,0.1);
            max-width: 520px; margin: 0 auto; padding: 32px; }
    h1 { font-size: 20px; margin-bottom: 8px; }
    .subtitle { color: #6b7280; font-size: 14px; margin-bottom: 20px; }
    .details { background: #f9fafb; border-radius: 8px; padding: 16px; margin: 16px 0; font-size: 14px; }
    .details dt { font-weight: 600; }
    .details dd { margin: 0 0 8px; word-break: break-all; }
    .warning { background: #fef3c7; border: 1px solid #fcd34d; border-radius: 8px; padding: 12px; font-size: 14px; }
    .error { background: #fee2e2; border: 1px solid #fca5a5; border-radius: 8px; padding: 12px; color: #991b1b; }
    .btn-group { display: flex; gap: 10px; margin-top: 20px; }
    .btn { flex: 1; padding: 12px; border: none; border-radius: 8px; font-size: 15px; cursor: pointer; font-weight: 500; }
    .btn-allow { background: #16a34a; color: white; }
    .btn-deny { background: #e5e7eb; color: #374151; }
    code { font-family: ui-monospace, monospace; font-size: 13px; }
  `;
}

export function pageShell(title: string, bodyHtml: string): string {
  return `<!DOCTYPE html>
<html lang="en"><head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>${baseStyles()}</style>
</head><body>${bodyHtml}</body></html>`;
}
