import { z } from 'zod';

export const CONFIG_FILE_NAMES = ['pharsmith.json', 'pharsmith.json.dist'] as const;

export const rawConfigSchema = z
  .object({
    'base-path': z.string().min(1).optional(),
    main: z.union([z.string().min(1), z.literal(false)]).optional(),
    output: z.string().min(1).optional(),
    directories: z.array(z.string().min(1)).optional(),
    files: z.array(z.string().min(1)).optional(),
    exclude: z.array(z.string().min(1)).optional(),
    alias: z.string().min(1).optional(),
    banner: z.union([z.string(), z.literal(false)]).optional(),
    shebang: z
      .union([z.string().startsWith('#!', { message: 'The shebang line must start with "#!"' }), z.literal(false)])
      .optional(),
    stub: z.union([z.string().min(1), z.boolean()]).optional(),
    metadata: z.string().optional(),
    compression: z.enum(['GZ', 'NONE']).optional(),
    algorithm: z.enum(['MD5', 'SHA1', 'SHA256', 'SHA512']).optional(),
    chmod: z
      .string()
      .regex(/^0?[0-7]{3}$/, { message: 'Expected an octal file mode such as "0755"' })
      .optional(),
    timestamp: z.string().datetime({ offset: true }).optional()
  })
  .strict();

export type RawConfig = z.infer<typeof rawConfigSchema>;
