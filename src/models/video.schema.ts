import { z } from 'zod';
import { ValidationError, type FieldIssue } from '../utils/error.js';

export const MAX_TITLE_LENGTH = 255;

export function isHttpUrl(value: string): boolean {
  if (!URL.canParse(value)) {
    return false;
  }
  const { protocol, hostname } = new URL(value);
  return (protocol === 'http:' || protocol === 'https:') && hostname.length > 0;
}

// Blank optional fields are stored as null so rendering falls back to defaults
const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

export const videoFormSchema = z.object({
  title: z
    .string({ required_error: 'Title is required' })
    .trim()
    .min(1, 'Title is required')
    .max(MAX_TITLE_LENGTH, `Title too long (max ${MAX_TITLE_LENGTH} characters)`),
  streamtape_url: z
    .string({ required_error: 'Video URL is required' })
    .trim()
    .superRefine((value, ctx) => {
      if (!value) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Video URL is required' });
      } else if (!isHttpUrl(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Video URL must be a well-formed http(s) URL' });
      }
    }),
  description: optionalText,
  hashtags: optionalText,
});

/** Raw form values as submitted */
export type VideoFormInput = z.input<typeof videoFormSchema>;
export type VideoFields = z.output<typeof videoFormSchema>;

export function parseVideoForm(input: Record<string, string | undefined>): VideoFields {
  const result = videoFormSchema.safeParse(input);

  if (!result.success) {
    const issues: FieldIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.length > 0 ? String(issue.path[0]) : 'form',
      message: issue.message,
    }));
    throw new ValidationError(issues);
  }

  return result.data;
}
