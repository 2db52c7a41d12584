/**
 * OAuth consent and error page views
 */

import { escapeHtml, pageShell } from './layout.js';

/** Render the consent prompt. Only the opaque request id travels in the form. */
export function renderConsentPage(params: {
  requestId: string;
  clientName: string;
  clientId: string;
  redirectUri: string;
  scope: string;
}): string {
  const redirectHost = new URL(params.redirectUri).host || params.redirectUri;

  return pageShell(
    'Authorize access',
    `
<div class="card">
  <h1>Authorize access</h1>
  <p class="subtitle"><strong>${escapeHtml(params.clientName)}</strong> wants to run commands on this server.</p>
  <div class="warning">Approving grants this application shell access with the permissions of the server process.</div>
  <dl class="details">
    <dt>Client ID</dt><dd><code>${escapeHtml(params.clientId)}</code></dd>
    <dt>Redirects to</dt><dd><code>${escapeHtml(redirectHost)}</code></dd>
    <dt>Scope</dt><dd><code>${escapeHtml(params.scope)}</code></dd>
  </dl>
  <form method="POST" action="/approve">
    <input type="hidden" name="request_id" value="${escapeHtml(params.requestId)}">
    <div class="btn-group">
      <button type="submit" name="decision" value="allow" class="btn btn-allow">Allow</button>
      <button type="submit" name="decision" value="deny" class="btn btn-deny">Deny</button>
    </div>
  </form>
</div>`
  );
}

/** Errors that cannot be redirected to the client are shown here. */
export function renderErrorPage(params: { error: string; description: string }): string {
  return pageShell(
    'Authorization error',
    `
<div class="card">
  <h1>Authorization failed</h1>
  <div class="error"><strong>${escapeHtml(params.error)}</strong>: ${escapeHtml(params.description)}</div>
  <p class="subtitle" style="margin-top:16px">Return to the application and start the sign-in again.</p>
</div>`
  );
}
