/**
 * JSON codec for the control-plane wire format
 *
 * Encoding only serializes. Decoding validates with Zod so that a value
 * handed back to callers is always complete: a Status either decodes fully
 * or not at all.
 */

import { z, ZodError } from 'zod';
import { DecodeError, EncodeError } from '../errors.js';
import {
  DEFAULT_INTERFACE_STATES,
  type Config,
  type ErrorPayload,
  type Status,
} from './types.js';

// ============================================
// Schemas
// ============================================

const PrefixConfigSchema = z.object({
  prefix: z.string(),
  on_link: z.boolean().optional(),
  autonomous: z.boolean().optional(),
  valid_lifetime_seconds: z.number().optional(),
  preferred_lifetime_seconds: z.number().optional(),
});

export const InterfaceConfigSchema = z.object({
  name: z.string(),
  ra_interval_ms: z.number(),
  hop_limit: z.number().optional(),
  managed: z.boolean().optional(),
  other: z.boolean().optional(),
  router_lifetime_seconds: z.number().optional(),
  reachable_time_ms: z.number().optional(),
  retransmit_time_ms: z.number().optional(),
  mtu: z.number().optional(),
  prefixes: z.array(PrefixConfigSchema).optional(),
});

export const ConfigSchema = z.object({
  interfaces: z.array(InterfaceConfigSchema),
});

/**
 * Builds the Status schema for a given set of recognized states.
 * The daemon encodes an empty interface list as `null`.
 */
export function createStatusSchema(states: readonly string[] = DEFAULT_INTERFACE_STATES) {
  const recognized = new Set(states);

  const InterfaceStatusSchema = z.object({
    name: z.string().min(1, 'interface name must not be empty'),
    state: z.string().refine((state) => recognized.has(state), (state) => ({
      message: `unrecognized interface state "${state}"`,
    })),
    message: z.string().optional(),
  });

  return z.object({
    interfaces: z
      .array(InterfaceStatusSchema)
      .nullable()
      .transform((interfaces) => interfaces ?? []),
  });
}

const DefaultStatusSchema = createStatusSchema();

export const ErrorPayloadSchema = z
  .object({
    message: z.string(),
  })
  .passthrough();

// ============================================
// Encode
// ============================================

/**
 * Serializes a Config. Non-finite numbers have no JSON form and are
 * rejected instead of silently becoming `null`.
 */
export function encodeConfig(config: Config): string {
  let body: string | undefined;
  try {
    body = JSON.stringify(config, (key, value: unknown) => {
      if (typeof value === 'number' && !Number.isFinite(value)) {
        throw new TypeError(`unsupported value ${value} for "${key}"`);
      }
      return value;
    });
  } catch (error) {
    throw new EncodeError(error);
  }

  if (body === undefined) {
    throw new EncodeError(new TypeError('config has no JSON representation'));
  }
  return body;
}

// ============================================
// Decode
// ============================================

function decodeWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string, text: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(what, text, error);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new DecodeError(what, text, new Error(summarizeIssues(result.error)));
  }
  return result.data;
}

export function decodeConfig(text: string): Config {
  return decodeWith(ConfigSchema, 'config', text);
}

export function decodeStatus(text: string, states?: readonly string[]): Status {
  const schema = states ? createStatusSchema(states) : DefaultStatusSchema;
  return decodeWith(schema, 'status', text);
}

export function decodeErrorPayload(text: string): ErrorPayload {
  return decodeWith(ErrorPayloadSchema, 'error', text);
}

/**
 * One line per issue, e.g. `interfaces.0.state: unrecognized interface state "Up"`.
 */
export function summarizeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
