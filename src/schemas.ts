import { z } from 'zod';

export const ProductRecordSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD'),
  category: z.string(),
  productName: z.string(),
  price: z.string().startsWith('$', 'price must start with $'),
  ounces: z.string(),
});

export type ValidatedProductRecord = z.infer<typeof ProductRecordSchema>;

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly zodError?: z.ZodError
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export interface ValidationResult {
  success: boolean;
  data?: ValidatedProductRecord;
  error?: ValidationError;
}

export function validateRecord(raw: unknown): ValidationResult {
  const result = ProductRecordSchema.safeParse(raw);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const firstIssue = result.error.issues[0];
  const field = firstIssue.path.join('.') || 'unknown';
  const message = `Validation failed for ${field}: ${firstIssue.message}`;

  return {
    success: false,
    error: new ValidationError(message, field, result.error),
  };
}
