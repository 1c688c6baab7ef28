import { z } from 'zod';

const SynonymTableSchema = z
  .record(z.string(), z.string().min(1, 'canonical label must not be empty'))
  .superRefine((table, ctx) => {
    for (const key of Object.keys(table)) {
      if (key !== key.trim().toLowerCase()) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `synonym key "${key}" must be lower-case with no surrounding whitespace`,
        });
      }
    }
  });

const SourceSchema = z.object({
  name: z.string().min(1, 'source name must not be empty').optional(),
});

const ReferenceSourceSchema = SourceSchema.extend({
  reviewIdColumn: z.string().min(1).optional(),
  aspectsColumn: z.string().min(1).optional(),
});

const WorstCasesSchema = z.object({
  limit: z.number().int().nonnegative('limit must be zero or more').optional(),
  f1Below: z.number().min(0).max(1, 'f1Below must be between 0 and 1').optional(),
});

export const AuditConfigSchema = z.object({
  schemaVersion: z.string(),
  threshold: z.number().min(0).max(100, 'threshold is a percentage between 0 and 100').optional(),
  worstCases: WorstCasesSchema.optional(),
  sources: z
    .object({
      reference: ReferenceSourceSchema.optional(),
      candidate: SourceSchema.optional(),
    })
    .optional(),
  // Inline synonym map, or a path (relative to the config file) to a YAML map
  vocabulary: z.union([z.string().min(1), SynonymTableSchema]).optional(),
});

export const VocabularyFileSchema = SynonymTableSchema;

export type AuditConfigFile = z.infer<typeof AuditConfigSchema>;
