// Block detection tests
import { BlockDetector } from './block-detection';
import type { RawResult } from './types';

function ok(html: string, httpStatus: number | null = 200): RawResult {
  return { ok: true, html, httpStatus, finalUrl: 'https://example.com/', elapsedMs: 10 };
}

const NORMAL_PAGE = `
  <html>
    <head><title>Widgets for sale</title></head>
    <body><h1>Widgets</h1><p>We sell widgets.</p></body>
  </html>
`;

describe('BlockDetector', () => {
  const detector = new BlockDetector();

  describe('HTTP status-based detection', () => {
    it.each([401, 403, 429, 503])('should classify status %i as blocked regardless of body', (status) => {
      expect(detector.classify(ok(NORMAL_PAGE, status))).toBe('blocked');
    });

    it('should report the status signal and error code', () => {
      const result = detector.inspect(ok(NORMAL_PAGE, 429));

      expect(result.verdict).toBe('blocked');
      expect(result.signal).toBe('status:429');
      expect(result.errorCode).toBe('BLOCK_STATUS_429');
    });

    it('should classify a failed attempt carrying a blocking status as blocked', () => {
      const raw: RawResult = {
        ok: false,
        error: 'Crawler-view API: subscription required',
        errorCode: 'FETCH_HTTP_4XX',
        httpStatus: 403,
        elapsedMs: 5,
      };

      expect(detector.classify(raw)).toBe('blocked');
    });

    it('should not treat other failures as blocks', () => {
      const raw: RawResult = {
        ok: false,
        error: 'connect ECONNREFUSED',
        errorCode: 'FETCH_CONNECTION',
        httpStatus: null,
        elapsedMs: 5,
      };

      expect(detector.inspect(raw)).toEqual({ verdict: 'success', signal: null, errorCode: null });
    });

    it('should not block 200, 404 or 500 responses with normal content', () => {
      expect(detector.classify(ok(NORMAL_PAGE, 200))).toBe('success');
      expect(detector.classify(ok(NORMAL_PAGE, 404))).toBe('success');
      expect(detector.classify(ok(NORMAL_PAGE, 500))).toBe('success');
    });
  });

  describe('HTML content-based detection', () => {
    it('should detect a browser verification page as challenged', () => {
      const html = `
        <html>
          <head><title>One more step</title></head>
          <body><div id="cf-browser-verification">Checking your browser before accessing example.com</div></body>
        </html>
      `;

      const result = detector.inspect(ok(html));

      expect(result.verdict).toBe('challenged');
      expect(result.signal).toBe('phrase:checking your browser');
      expect(result.errorCode).toBe('BLOCK_CHALLENGE_PAGE');
    });

    it('should match challenge phrases case-insensitively', () => {
      expect(detector.classify(ok('<html><body>DDoS Protection by someone</body></html>'))).toBe('challenged');
    });

    it('should detect challenge markers in scripts and URLs', () => {
      expect(detector.classify(ok('<script src="/cdn-cgi/challenge-platform/h/b"></script>'))).toBe('challenged');
      expect(detector.classify(ok('<form action="/?__cf_chl_tk=abc"></form>'))).toBe('challenged');
    });

    it('should detect blocking page titles', () => {
      const result = detector.inspect(ok('<html><head><title>  Access   Denied </title></head><body></body></html>'));

      expect(result.verdict).toBe('blocked');
      expect(result.signal).toBe('title:access denied');
      expect(result.errorCode).toBe('BLOCK_ERROR_TITLE');
    });

    it('should only match whole blocking titles', () => {
      const html = '<html><head><title>Error handling in TypeScript</title></head></html>';

      expect(detector.classify(ok(html))).toBe('success');
    });

    it('should report a "Just a moment" page as a challenge, not a title block', () => {
      const result = detector.inspect(ok('<html><head><title>Just a moment...</title></head></html>'));

      expect(result.verdict).toBe('challenged');
      expect(result.signal).toBe('phrase:just a moment');
    });

    it('should pass normal content', () => {
      expect(detector.inspect(ok(NORMAL_PAGE))).toEqual({ verdict: 'success', signal: null, errorCode: null });
    });
  });

  describe('custom signatures', () => {
    it('should accept extra phrases and titles', () => {
      const custom = new BlockDetector({
        extraChallengePhrases: ['Verifying You Are Human'],
        extraBlockingTitles: ['Bot Wall'],
      });

      expect(custom.classify(ok('<p>verifying you are human</p>'))).toBe('challenged');
      expect(custom.classify(ok('<title>bot wall</title>'))).toBe('blocked');
      expect(detector.classify(ok('<title>bot wall</title>'))).toBe('success');
    });
  });

  describe('isChallenge', () => {
    it('should check content only', () => {
      expect(detector.isChallenge('<div class="challenge-running"></div>')).toBe(true);
      expect(detector.isChallenge(NORMAL_PAGE)).toBe(false);
    });
  });
});
