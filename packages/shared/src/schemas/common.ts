import { z } from 'zod';
import 'zod-openapi/extend';

// ---- Error response ----
export const ErrorResponseSchema = z
  .object({
    error: z.object({
      code: z.string().openapi({ description: 'Machine-readable error code', example: 'UNAUTHORIZED' }),
      message: z.string().openapi({ description: 'Human-readable error message' }),
      details: z.record(z.unknown()).optional().openapi({ description: 'Additional error details' }),
    }),
  })
  .openapi({ ref: 'ErrorResponse' });

// ---- Plain acknowledgement ----
export const MessageResponseSchema = z
  .object({
    message: z.string().openapi({ example: 'Announcement updated successfully' }),
  })
  .openapi({ ref: 'MessageResponse' });

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

/** Boolean carried in a query string (`true/false/1/0/yes/no/on/off`, any case). */
export const QueryBooleanSchema = z
  .string()
  .toLowerCase()
  .refine((v) => TRUE_VALUES.includes(v) || FALSE_VALUES.includes(v), 'Expected a boolean')
  .transform((v) => TRUE_VALUES.includes(v))
  .openapi({ description: 'Boolean flag (true/false/1/0/yes/no/on/off)', example: 'true' });
