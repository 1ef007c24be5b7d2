import type { Logger } from '../infrastructure/logging/Logger.js';

declare global {
  namespace Express {
    interface Locals {
      logger?: Logger;
      requestId?: string;
    }
  }
}

export {};
