/* src/cli/config/schema.ts
 * Zod schema for repack.config.* (all keys optional; flags override them).
 */
import { z } from 'zod';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = String(v).trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

const nonEmpty = (field: string) =>
  z.string().min(1, { message: `${field} must be a non-empty string` });

const collaboratorSchema = z
  .object({
    command: nonEmpty('command'),
    args: z.array(z.string()).optional(),
  })
  .strict();

export const dialectSchema = z.enum(['7z', 'archive-tool']);

const archiverSchema = collaboratorSchema
  .extend({ dialect: dialectSchema.optional() })
  .strict();

export const repackConfigSchema = z
  .object({
    source: nonEmpty('source').optional(),
    pattern: nonEmpty('pattern').optional(),
    workspace: nonEmpty('workspace').optional(),
    output: nonEmpty('output').optional(),
    // String shorthand: the executable alone.
    archiver: z.union([nonEmpty('archiver'), archiverSchema]).optional(),
    scanner: z.union([nonEmpty('scanner'), collaboratorSchema]).optional(),
    timeout: z.coerce.number().nonnegative().optional(),
    killGrace: z.coerce.number().positive().optional(),
    forceClean: coerceBool,
    plan: coerceBool,
    debug: coerceBool,
    boring: coerceBool,
  })
  .strict();
export type RepackConfig = z.infer<typeof repackConfigSchema>;
