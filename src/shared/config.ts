/**
 * Configuration System
 *
 * Optional YAML file naming the commands used to list entries, set BootNext and reboot.
 */
import fs from 'fs/promises';
import YAML from 'yaml';
import { z } from 'zod';

export const DEFAULT_CONFIG_PATH = '/etc/reboot-to.yaml';

export const CONFIG_PATH_ENV = 'REBOOT_TO_CONFIG';

const commandSchema = (command: string, args: string[]) =>
  z
    .object({
      command: z.string().min(1).default(command),
      args: z.array(z.string()).default(args),
    })
    .default({});

/**
 * External commands the tool drives
 */
export const bootToolConfigSchema = z
  .object({
    list: commandSchema('efibootmgr', []),
    setNext: commandSchema('efibootmgr', ['--bootnext']),
    reboot: commandSchema('shutdown', ['-r', 'now']),
  })
  .default({});

export type BootToolConfig = z.infer<typeof bootToolConfigSchema>;

export type CommandConfig = BootToolConfig['list'];

/**
 * Full configuration file schema
 */
export const configFileSchema = z.object({
  commands: bootToolConfigSchema,
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Built-in configuration, used when no file exists
 */
export function getDefaultConfig(): ConfigFile {
  return configFileSchema.parse({});
}

/**
 * Load and parse the configuration file
 */
export async function loadConfig(configPath: string): Promise<ConfigFile> {
  try {
    const content = await fs.readFile(configPath, 'utf-8');
    // An empty file parses to null
    const parsed: unknown = YAML.parse(content) ?? {};

    const result = configFileSchema.safeParse(parsed);

    if (!result.success) {
      const [first] = result.error.issues;
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
      throw new ConfigValidationError(`Invalid configuration file: ${issues}`, first?.path.join('.'));
    }

    return result.data;
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      throw error;
    }

    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigValidationError(`Configuration file not found: ${configPath}`);
    }

    if (error instanceof YAML.YAMLParseError) {
      throw new ConfigValidationError(`Invalid YAML syntax: ${error.message}`);
    }

    throw new ConfigValidationError(`Failed to load configuration: ${(error as Error).message}`);
  }
}

/**
 * Check if a configuration file exists
 */
export async function configExists(configPath: string): Promise<boolean> {
  try {
    await fs.access(configPath);
    return true;
  } catch {
    return false;
  }
}
