import { describe, it, expect } from 'vitest';
import { renderConsentPage, renderErrorPage } from '../../src/views/consent.js';
import { escapeHtml } from '../../src/views/layout.js';

describe('views', () => {
  describe('escapeHtml', () => {
    it('should escape markup characters', () => {
      expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
    });
  });

  describe('renderConsentPage', () => {
    const html = renderConsentPage({
      requestId: 'req-123',
      clientName: '<script>alert(1)</script>',
      clientId: 'client-1',
      redirectUri: 'https://app.example.com/oauth/callback?x=1',
      scope: 'mcp:tools',
    });

    it('should escape the client name', () => {
      expect(html).toContain('<strong>&lt;script&gt;alert(1)&lt;/script&gt;</strong>');
      expect(html).not.toContain('<script>');
    });

    it('should post the request id and decision to /approve', () => {
      expect(html).toContain('<form method="POST" action="/approve">');
      expect(html).toContain('<input type="hidden" name="request_id" value="req-123">');
      expect(html).toContain('name="decision" value="allow"');
      expect(html).toContain('name="decision" value="deny"');
    });

    it('should show the redirect host', () => {
      expect(html).toContain('<dt>Redirects to</dt><dd><code>app.example.com</code></dd>');
    });
  });

  describe('renderErrorPage', () => {
    it('should show the error code and description', () => {
      expect(renderErrorPage({ error: 'invalid_request', description: 'Bad <input>' })).toContain(
        '<strong>invalid_request</strong>: Bad &lt;input&gt;'
      );
    });
  });
});
