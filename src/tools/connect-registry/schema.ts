import { z } from 'zod';
import { DEFAULT_REGISTRY } from '../../config/defaults';

export const connectRegistrySchema = z.object({
  name: z.string().min(1).default(DEFAULT_REGISTRY.name).describe('Registry container name'),
  image: z.string().min(1).default(DEFAULT_REGISTRY.image).describe('Registry image'),
  port: z
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(DEFAULT_REGISTRY.port)
    .describe('Host port the registry is published on'),
});

export type ConnectRegistryParams = z.input<typeof connectRegistrySchema>;
