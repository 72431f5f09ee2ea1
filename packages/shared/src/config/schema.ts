import { z } from 'zod';
import { LOG_LEVELS } from '../logger/types';

/** Folder searched when the query names none. */
export const DEFAULT_FOLDER = '~';

export const ColorModeSchema = z.enum(['auto', 'always', 'never']);
export type ColorMode = z.infer<typeof ColorModeSchema>;

export const FindConfigSchema = z.object({
  defaultFolder: z
    .string()
    .transform((value) => value.trim())
    .pipe(z.string().min(1))
    .catch(DEFAULT_FOLDER)
    .default(DEFAULT_FOLDER),
  openCommand: z.string().trim().min(1).optional(),
  color: ColorModeSchema.default('auto'),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
});

export type FindConfig = z.infer<typeof FindConfigSchema>;
export type FindConfigInput = z.input<typeof FindConfigSchema>;
