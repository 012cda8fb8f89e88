import { z } from 'zod';

const environmentValue = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const stackEntrySchema = z
  .object({
    name: z.string().nullish(),
    directory: z.string().nullish(),
    file: z.union([z.string(), z.array(z.string())]).nullish(),
    depends_on: z.array(z.string()).nullish(),
    environment: z.record(z.string(), environmentValue).nullish(),
  })
  .passthrough();

export const stacksFileSchema = z
  .object({
    command: z.string().trim().min(1, 'command must not be empty').optional(),
    stacks: z.record(z.string(), stackEntrySchema.nullable()).nullish(),
  })
  .passthrough();

export type StackEntry = z.infer<typeof stackEntrySchema>;

const extraKeys = (value: object, known: string[], prefix: string): string[] =>
  Object.keys(value)
    .filter((key) => !known.includes(key) && !key.startsWith('x-'))
    .map((key) => `${prefix}${key}`);

/**
 * Keys the loader does not read, as dotted paths. `x-` keys hold YAML
 * anchors and other extensions and are never reported.
 */
export const findUnknownKeys = (file: z.infer<typeof stacksFileSchema>): string[] => [
  ...extraKeys(file, Object.keys(stacksFileSchema.shape), ''),
  ...Object.entries(file.stacks ?? {}).flatMap(([stackKey, entry]) =>
    entry ? extraKeys(entry, Object.keys(stackEntrySchema.shape), `stacks.${stackKey}.`) : []
  ),
];
