import helmet from 'helmet';

/**
 * Security headers for a JSON-only API: nothing may be framed, sniffed or
 * loaded from responses.
 */
export function createSecurityHeaders(production = process.env.NODE_ENV === 'production') {
  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    frameguard: { action: 'deny' },
    crossOriginEmbedderPolicy: false,
    hsts: production ? { maxAge: 31536000, includeSubDomains: true } : false,
  });
}
