import { z } from 'zod';

export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_MAX_FILE_SIZE_BYTES = 1024 * 1024;
export const DEFAULT_FALLBACK_ENCODINGS = ['shift_jis', 'gb18030', 'euc-kr', 'windows-1252'];

export const OutputFormatSchema = z.enum(['markdown', 'json', 'yaml', 'text']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const OverflowPolicySchema = z
  .enum(['keep', 'drop', 'abort'])
  .describe('What happens to files that push the running total past the ceiling');

/** Extensions are stored without the leading dot, lowercased. */
const ExtensionListSchema = z
  .array(z.string().min(1))
  .transform((exts) => exts.map((ext) => ext.replace(/^\./, '').toLowerCase()));

export const PackConfigSchema = z
  .object({
    modelName: z.string().min(1).default(DEFAULT_MODEL),
    maxTokensPerFile: z
      .number()
      .int()
      .min(0)
      .default(2000)
      .describe('Per-file token cap; 0 disables truncation'),
    maxTotalTokens: z
      .number()
      .int()
      .positive()
      .optional()
      .describe("Overrides the model's context window as the run ceiling"),
    overflowPolicy: OverflowPolicySchema.default('keep'),
    outputFormat: OutputFormatSchema.default('markdown'),
    includeMetadata: z.boolean().default(true),
    includeTimestamp: z.boolean().default(true),
    workerCount: z.number().int().min(1).max(256).optional(),
    maxFileSizeBytes: z.number().int().positive().default(DEFAULT_MAX_FILE_SIZE_BYTES),
    stripComments: z.boolean().default(false),
    maxBlankLines: z.number().int().min(0).default(2),
    fallbackEncodings: z.array(z.string().min(1)).default(DEFAULT_FALLBACK_ENCODINGS),
    ignoreFile: z.string().min(1).optional(),
    bypassIgnore: z.boolean().default(false),
    extraIgnorePatterns: z.array(z.string()).default([]),
    includeExtensions: ExtensionListSchema.optional(),
    excludeExtensions: ExtensionListSchema.default([]),
  })
  .strict()
  .refine(
    (data) =>
      data.maxTotalTokens === undefined ||
      data.maxTokensPerFile === 0 ||
      data.maxTokensPerFile <= data.maxTotalTokens,
    {
      message: 'maxTokensPerFile cannot exceed maxTotalTokens',
      path: ['maxTokensPerFile'],
    },
  );

/** Fully resolved configuration, after defaults. */
export type PackConfig = z.infer<typeof PackConfigSchema>;
/** Shape accepted from YAML files and flags. */
export type PackConfigInput = z.input<typeof PackConfigSchema>;
