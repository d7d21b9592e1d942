import 'express';
import type { OutputFormat } from '@shared/schema';

declare global {
  namespace Express {
    /** Normalized schedule request after validation middleware */
    interface ValidatedScheduleRequest {
      year: number;
      week: number;
      format: OutputFormat | 'json';
      links: boolean;
      quality: boolean;
      records: boolean;
    }

    interface Request {
      /** Set by validation middleware after Zod-based normalization */
      validated?: {
        schedule?: ValidatedScheduleRequest;
      };
    }
  }
}

export {}; // ensure this file is treated as a module
