/**
 * Zod Schemas for Runtime Validation
 *
 * The merged configuration comes from files and the process environment, so
 * every value arrives as a string and is validated here before use.
 */

import { isIP } from 'node:net';
import { z } from 'zod';

// ============================================================================
// Primitive Schemas
// ============================================================================

const HOSTNAME_PATTERN =
  /^(?=.{1,253}$)[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

/**
 * Accepts IPv4/IPv6 literals and RFC 1123 hostnames.
 */
export function isValidBindAddress(value: string): boolean {
  return isIP(value) !== 0 || HOSTNAME_PATTERN.test(value);
}

/**
 * Digit-only strings become numbers; anything else is left for the number
 * schema to reject.
 */
function numericString(value: unknown): unknown {
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return Number(value.trim());
  }
  return value;
}

export const PortSchema = z.preprocess(
  numericString,
  z
    .number({ invalid_type_error: 'must be a number' })
    .int('must be an integer')
    .min(1, 'must be between 1 and 65535')
    .max(65535, 'must be between 1 and 65535')
);

export const ContainerRuntimeNameSchema = z.enum(['podman', 'docker']);

export type ContainerRuntimeName = z.infer<typeof ContainerRuntimeNameSchema>;

const OptionalUrlSchema = z.string().url('must be a URL').optional();

// ============================================================================
// Config Schema
// ============================================================================

export const PortsSchema = z.object({
  http: PortSchema,
  notebook: PortSchema,
  codeEditor: PortSchema,
  debug: PortSchema,
});

/**
 * Schema for the fully merged configuration.
 */
export const DevcellConfigSchema = z.object({
  containerRuntime: ContainerRuntimeNameSchema,
  bindAddress: z
    .string()
    .refine(isValidBindAddress, 'must be an IPv4/IPv6 address or a hostname'),
  socketPath: z.string().min(1),
  ports: PortsSchema,

  proxy: z.object({
    httpProxy: z.string().optional(),
    httpsProxy: z.string().optional(),
    noProxy: z.string().optional(),
  }),

  registries: z.object({
    npmRegistry: OptionalUrlSchema,
    pipIndexUrl: OptionalUrlSchema,
    mavenRepositoryUrl: OptionalUrlSchema,
  }),

  aws: z.object({
    profile: z.string().optional(),
    region: z.string().min(1),
    bedrockRegion: z.string().min(1),
    bedrockModelId: z.string().min(1),
    accessKeyId: z.string().optional(),
    secretAccessKey: z.string().optional(),
    sessionToken: z.string().optional(),
  }),

  git: z.object({
    userName: z.string().optional(),
    userEmail: z.string().optional(),
    githubToken: z.string().optional(),
    githubEnterpriseUrl: OptionalUrlSchema,
  }),

  resources: z.object({
    memoryLimit: z.string().regex(/^\d+[bkmg]?$/i, 'must look like 4g or 512m').optional(),
    cpuLimit: z.string().regex(/^\d+(\.\d+)?$/, 'must be a number of CPUs').optional(),
  }),

  build: z.object({
    containerfile: z.string().min(1),
    timeoutSeconds: z.preprocess(numericString, z.number().int().positive()),
  }),
});

export type ValidatedDevcellConfig = z.infer<typeof DevcellConfigSchema>;
