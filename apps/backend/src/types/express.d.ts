import type { Logger } from '../utils/logger.js';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      /** Logger bound to this request's id; set by requestContext. */
      log?: Logger;
    }
  }
}

export {};
