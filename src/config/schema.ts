/**
 * schema.ts
 *
 * Zod schema for `Warden` options. Values arrive from code and from the
 * environment, so every field is checked before a configuration snapshot
 * is built.
 */

import { z } from 'zod';
import { isRevocationRepo } from '../stores/repo';
import {
  Clock,
  INFINITE_TTL,
  RevocationRepo,
  Serializer,
  WardenAlgorithm,
  WardenLogger,
} from '../types';

const isFunction = (value: unknown): boolean => typeof value === 'function';

function hasMethods(value: unknown, ...methods: string[]): boolean {
  if (typeof value !== 'object' || value === null) return false;
  return methods.every((method) => isFunction(Reflect.get(value, method)));
}

const secretSchema = z.union([
  z.string().min(1, { message: 'Secret cannot be empty.' }),
  z.instanceof(Buffer).refine((value) => value.length > 0, { message: 'Secret cannot be empty.' }),
], { errorMap: () => ({ message: 'Secret must be a non-empty string or Buffer.' }) });

const repoSchema = z.union([
  z.literal(false),
  z.custom<RevocationRepo>(isRevocationRepo, {
    message: 'Repository must implement exists, insert and delete.',
  }),
]);

export const wardenOptionsSchema = z.object({
  secret: secretSchema,
  defaultAlg: z.nativeEnum(WardenAlgorithm).default(WardenAlgorithm.HS256),
  defaultTtl: z.union([z.number().int(), z.literal(INFINITE_TTL)]).default(3600),
  defaultIss: z.string().optional(),
  defaultAud: z.string().optional(),
  defaultSub: z.union([z.string(), z.number().int()]).optional(),
  defaultScopes: z.array(z.string()).default([]),
  defaultJti: z
    .union([
      z.string(),
      z.literal(false),
      z.custom<() => string>(isFunction, { message: 'jti strategy must be a string, a function or false.' }),
    ])
    .optional(),
  blacklist: repoSchema.default(false),
  banlist: repoSchema.default(false),
  serializer: z
    .custom<Serializer<unknown>>((value) => hasMethods(value, 'forToken', 'fromToken'), {
      message: 'Serializer must implement forToken and fromToken.',
    })
    .optional(),
  clock: z
    .custom<Clock>((value) => hasMethods(value, 'now'), { message: 'Clock must implement now.' })
    .optional(),
  logger: z
    .custom<WardenLogger>((value) => hasMethods(value, 'debug', 'info', 'warn', 'error'), {
      message: 'Logger must implement debug, info, warn and error.',
    })
    .optional(),
});
