/**
 * Zod schemas for provisioner configuration.
 *
 * Notes:
 * - `ProvisionConfigSchema` is the fully-resolved value threaded through every phase.
 * - `ProvisionConfigFileSchema` is what an optional `--config` YAML file may override.
 *   Every field is optional and unknown keys are rejected, so typos fail loudly.
 */
import { z } from 'zod';

const ThresholdsSchema = z.object({
  // Below this much RAM the preflight warns but continues.
  lowMemoryMb: z.number().int().positive(),
  // Below this much free disk on `/` the preflight aborts.
  minFreeDiskGb: z.number().int().nonnegative(),
});

const NetworkSchema = z.object({
  probeUrl: z.string().url(),
  timeoutMs: z.number().int().positive(),
});

const NodeSchema = z.object({
  // An installed node at or above this major is left alone.
  minMajor: z.number().int().positive(),
  // NodeSource channel used when installing.
  setupMajor: z.number().int().positive(),
});

// Interpolated into shell commands (sudo -u, usermod, chown), so keep it to a login name.
const UserNameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, 'not a valid user name');

const ProvisionConfigSchema = z.object({
  realUser: UserNameSchema,
  homeDir: z.string().min(1),
  workspaceRoot: z.string().min(1),
  profilePath: z.string().min(1),
  logFile: z.string().min(1),
  interactive: z.boolean(),
  thresholds: ThresholdsSchema,
  network: NetworkSchema,
  node: NodeSchema,
});

const ProvisionConfigFileSchema = z
  .object({
    homeDir: z.string().min(1).optional(),
    workspaceRoot: z.string().min(1).optional(),
    profilePath: z.string().min(1).optional(),
    logFile: z.string().min(1).optional(),
    thresholds: ThresholdsSchema.partial().strict().optional(),
    network: NetworkSchema.partial().strict().optional(),
    node: NodeSchema.partial().strict().optional(),
  })
  .strict();

export type ProvisionConfig = z.infer<typeof ProvisionConfigSchema>;
export type ProvisionConfigFile = z.infer<typeof ProvisionConfigFileSchema>;

export { ProvisionConfigSchema, ProvisionConfigFileSchema };
