import { z, ZodError, ZodTypeAny } from 'zod';
import { FieldIssue, RequestValidationError } from './errors';

const MAX_TEXT_LENGTH = 256;

// Length in characters (code points), not UTF-16 units, so astral symbols
// such as emoji count once.
const boundedText = z.string().superRefine((value, ctx) => {
  if (Array.from(value).length > MAX_TEXT_LENGTH) {
    ctx.addIssue({
      code: z.ZodIssueCode.too_big,
      maximum: MAX_TEXT_LENGTH,
      type: 'string',
      inclusive: true,
      exact: false,
      message: `String must contain at most ${MAX_TEXT_LENGTH} character(s)`,
    });
  }
});

const optionalText = boundedText.nullable().optional();

export const createPostSchema = z.object({
  id: z.string().min(1),
  user_id: z.string().min(1),
  content: boundedText,
  media_url: optionalText,
});

export const createMappingSchema = z.object({
  post_id: z.string().min(1),
  user_id: z.string().min(1),
  comments: optionalText,
  liked: z.boolean().default(false),
  disliked: z.boolean().default(false),
});

export const formatZodError = (error: ZodError): FieldIssue[] =>
  error.errors.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));

/**
 * Returns the parsed body (unknown keys stripped, defaults applied) or throws
 * a RequestValidationError listing every failing field.
 */
export function parseBody<T extends ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError(formatZodError(result.error));
  }
  return result.data;
}
