import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const NODE_ENVS = ['development', 'production', 'test'] as const;

export const runtimeSection = {
  name: 'runtime',
  description: 'Runtime environment.',
  options: {
    nodeEnv: {
      envKey: 'NODE_ENV',
      defaultValue: 'development',
      description: 'development, production or test. Production disables pretty logs.',
      schema: z.enum(NODE_ENVS),
      allowedValues: NODE_ENVS,
    },
  },
} satisfies ConfigSectionMeta;
