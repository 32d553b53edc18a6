import helmet from 'helmet';
import type { RequestHandler } from 'express';

/**
 * JSON-only API: nothing is ever rendered, so the CSP forbids everything.
 */
export const policies = (): RequestHandler =>
  helmet({
    referrerPolicy: { policy: ['no-referrer'] },
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    frameguard: { action: 'deny' },
    crossOriginResourcePolicy: { policy: 'same-origin' },
  });
