import { z } from 'zod';

// ISO-8601 instant as written by Date#toISOString; rejects strings Date cannot parse
export const TimestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' });
