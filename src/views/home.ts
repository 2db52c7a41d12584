import { escapeHtml, pageShell } from './layout.js';

export function renderHomePage(baseUrl: string): string {
  const link = (path: string) => `<code>${escapeHtml(`${baseUrl}${path}`)}</code>`;

  return pageShell(
    'Bash MCP server',
    `
<div class="card">
  <h1>Bash MCP server</h1>
  <p class="subtitle">Remote command execution over the Model Context Protocol, protected by OAuth 2.1 with PKCE.</p>
  <dl class="details">
    <dt>MCP endpoint</dt><dd>${link('/mcp')}</dd>
    <dt>Authorization server metadata</dt><dd>${link('/.well-known/oauth-authorization-server')}</dd>
    <dt>Client registration</dt><dd>${link('/register')}</dd>
  </dl>
</div>`
  );
}
