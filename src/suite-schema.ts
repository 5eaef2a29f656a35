import { z, type ZodError } from 'zod';

const headerValueSchema = z.union([z.string(), z.array(z.string())]);

const statusExpectationSchema = z.object({
  status: z.number().int(),
});

export const requestEntrySchema = z
  .object({
    id: z.string().min(1).optional(),
    method: z.string().default('GET'),
    url: z.string(),
    headers: z.record(headerValueSchema).optional(),
    basicAuth: z.object({ username: z.string(), password: z.string() }).optional(),
    /** A string is sent as is; `{ json }` is serialized */
    body: z.union([z.string(), z.object({ json: z.unknown() })]).optional(),
    /** Seconds */
    timeout: z.number().positive().optional(),
    iterations: z.number().int().optional(),
    /** Milliseconds between retries */
    sleep: z.number().nonnegative().optional(),
    expect: z
      .object({
        status: z.number().int().optional(),
        body: z.enum(['empty', 'json']).optional(),
      })
      .strict()
      .optional(),
    until: statusExpectationSchema.optional(),
    skipGroupUnless: statusExpectationSchema.optional(),
  })
  .strict()
  .refine((entry) => !(entry.until && entry.skipGroupUnless), {
    message: 'until and skipGroupUnless cannot be combined',
  });

/** A top-level array of entries is read as `{ requests: [...] }`. */
export const suiteSchema = z
  .object({
    name: z.string().optional(),
    id: z.string().optional(),
    requests: z.array(requestEntrySchema),
  })
  .strict();

export type RequestEntry = z.infer<typeof requestEntrySchema>;
export type SuiteDocument = z.infer<typeof suiteSchema>;

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}
