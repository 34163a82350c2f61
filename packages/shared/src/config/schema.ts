import { z } from 'zod';

export const DEFAULT_OUTPUT_FILE = 'project_structure.txt';
export const DEFAULT_RULES_FILE = '.gitignore';

export const DecodeErrorsModeSchema = z.enum(['replace', 'placeholder']);
export type DecodeErrorsMode = z.infer<typeof DecodeErrorsModeSchema>;

export const OpaqueConfigSchema = z
  .object({
    /** Extra extensions (with or without the leading dot) whose content is never read */
    extensions: z.array(z.string().min(1)).default([]),
    /** Extra file names whose content is never read */
    fileNames: z.array(z.string().min(1)).default([]),
  })
  .strict()
  .default({ extensions: [], fileNames: [] });

export type OpaqueConfig = z.infer<typeof OpaqueConfigSchema>;

export const DumpConfigSchema = z
  .object({
    configVersion: z.literal(1).default(1),
    outputFile: z.string().min(1).default(DEFAULT_OUTPUT_FILE),
    rulesFile: z.string().min(1).default(DEFAULT_RULES_FILE),
    requireRules: z.boolean().default(false),
    maxDepth: z.number().int().nonnegative().optional(),
    excludeDirs: z
      .array(
        z
          .string()
          .min(1)
          .refine((name) => !/[\\/]/.test(name), {
            message: 'must be a single directory name, not a path',
          }),
      )
      .default([]),
    decodeErrors: DecodeErrorsModeSchema.default('replace'),
    opaque: OpaqueConfigSchema,
    logFile: z.string().min(1).optional(),
  })
  .strict();

export type DumpConfig = z.infer<typeof DumpConfigSchema>;
export type DumpConfigInput = z.input<typeof DumpConfigSchema>;
