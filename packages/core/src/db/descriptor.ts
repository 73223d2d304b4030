/**
 * Descriptor validation for connect requests that arrive untyped
 * (tool calls, JSON payloads).
 */

import { z } from 'zod';
import { connectionError } from '../errors.js';
import type { ConnectionDescriptor } from './types.js';

export const connectionDescriptorSchema = z.object({
  engine: z.enum(['postgres', 'mysql', 'sqlite'], {
    errorMap: () => ({ message: 'Unsupported database engine. Supported: postgres, mysql, sqlite.' }),
  }),
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  database: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  password: z.string().optional(),
  ssl: z.boolean().optional(),
  path: z.string().min(1).optional(),
  connectTimeoutMs: z.number().int().positive().optional(),
});

/** Parse a connect request; anything malformed is a ConnectionError naming the first bad field */
export function parseDescriptor(input: unknown): ConnectionDescriptor {
  const result = connectionDescriptorSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const [issue] = result.error.issues;
  const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  throw connectionError(`Invalid connection descriptor: ${where}${issue ? issue.message : 'unreadable input'}`);
}
