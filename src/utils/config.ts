/**
 * Configuration Loader for paclean
 *
 * Supports loading configuration from:
 * - .pacleanrc (JSON or YAML)
 * - .pacleanrc.json
 * - .pacleanrc.yaml / .pacleanrc.yml
 * - paclean.config.json
 *
 * Precedence: defaults < config file < environment < CLI options
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { DEFAULT_EXTENSIONS } from '../catalogs/cache-catalog';
import { DEFAULT_KEEP } from '../core/selection';
import { ConfigError } from './errors';

export const OUTPUT_FORMATS = ['text', 'json', 'yaml'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const configSchema = z
    .object({
        /** Package cache directory */
        cachePath: z.string().min(1),
        /** Local package database */
        installedPath: z.string().min(1),
        /** Cache entries to keep per installed package */
        keep: z.number().int().nonnegative(),
        /** Archive suffixes recognised in the cache, without the leading dot */
        extensions: z.array(z.string().min(1)).min(1),
        /** Accepted architectures; empty accepts any */
        architectures: z.array(z.string().min(1)),
        /** Abort on an unparseable cache file name, or skip it with a warning */
        onMalformed: z.enum(['error', 'warn']),
        /** Sort listed output */
        sort: z.boolean(),
        format: z.enum(OUTPUT_FORMATS),
        quiet: z.boolean(),
        verbose: z.boolean(),
    })
    .strict();

export type PacleanConfig = z.infer<typeof configSchema>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: PacleanConfig = {
    cachePath: '/var/cache/pacman/pkg',
    installedPath: '/var/lib/pacman/local',
    keep: DEFAULT_KEEP,
    extensions: DEFAULT_EXTENSIONS,
    architectures: [],
    onMalformed: 'error',
    sort: false,
    format: 'text',
    quiet: false,
    verbose: false,
};

/**
 * Configuration file search locations (in order)
 */
const CONFIG_FILES = ['.pacleanrc', '.pacleanrc.json', '.pacleanrc.yaml', '.pacleanrc.yml', 'paclean.config.json'];

/**
 * Environment variables mapped onto config keys
 */
const ENV_OVERRIDES = {
    PACLEAN_CACHE_PATH: 'cachePath',
    PACLEAN_INSTALLED_PATH: 'installedPath',
} as const;

/**
 * Find configuration file by walking up directory tree
 */
export function findConfigFile(startDir: string): string | null {
    let dir = path.resolve(startDir);

    for (;;) {
        for (const filename of CONFIG_FILES) {
            const configPath = path.join(dir, filename);
            if (fs.existsSync(configPath)) {
                return configPath;
            }
        }
        const parent = path.dirname(dir);
        if (parent === dir) return null;
        dir = parent;
    }
}

/**
 * Parse configuration from file content
 */
function parseConfigFile(filepath: string): unknown {
    const content = fs.readFileSync(filepath, 'utf-8');
    const ext = path.extname(filepath).toLowerCase();

    if (ext === '.yaml' || ext === '.yml') {
        return yaml.parse(content);
    }

    // JSON files (including .pacleanrc without extension)
    try {
        return JSON.parse(content);
    } catch {
        // extensionless .pacleanrc may be YAML
        return yaml.parse(content);
    }
}

/**
 * Validate a partial configuration coming from a file, the environment or the CLI
 */
export function validatePartialConfig(input: unknown, source: string | null = null): Partial<PacleanConfig> {
    // an empty YAML document parses to null
    if (input === null || input === undefined) return {};

    const result = configSchema.partial().safeParse(input);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`, source);
    }
    return result.data;
}

function loadFromEnv(env: NodeJS.ProcessEnv): Partial<PacleanConfig> {
    const overrides: Partial<PacleanConfig> = {};
    for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
        const value = env[variable];
        if (value) {
            overrides[key] = value;
        }
    }
    return overrides;
}

export interface LoadConfigOptions {
    cwd?: string;
    /** Explicit config file; disables the directory walk */
    configFile?: string;
    env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
    config: PacleanConfig;
    source: string | null;
}

/**
 * Load and merge configuration from all sources
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;

    let config: PacleanConfig = { ...DEFAULT_CONFIG };
    let source: string | null = null;

    const configFile = options.configFile ? path.resolve(cwd, options.configFile) : findConfigFile(cwd);
    if (configFile) {
        let raw: unknown;
        try {
            raw = parseConfigFile(configFile);
        } catch (error) {
            throw new ConfigError('Failed to read config file', configFile, error);
        }
        config = mergeConfig(config, validatePartialConfig(raw, configFile));
        source = configFile;
    }

    config = mergeConfig(config, loadFromEnv(env));

    return { config, source };
}

/**
 * Merge configuration objects, skipping undefined values
 */
export function mergeConfig(base: PacleanConfig, override: Partial<PacleanConfig>): PacleanConfig {
    const defined = Object.fromEntries(Object.entries(override).filter(([, value]) => value !== undefined));
    return { ...base, ...defined };
}

/**
 * Merge CLI options with loaded config (CLI takes precedence)
 */
export function mergeWithCliOptions(config: PacleanConfig, cliOptions: Partial<PacleanConfig>): PacleanConfig {
    return mergeConfig(config, validatePartialConfig(cliOptions, 'command line'));
}

/**
 * Generate example configuration file content
 */
export function generateExampleConfig(): string {
    return `# paclean configuration
# Place this file as .pacleanrc.yaml in the working directory or any parent

# Package cache directory
cachePath: /var/cache/pacman/pkg

# Local package database
installedPath: /var/lib/pacman/local

# Cache entries to keep per installed package
keep: 2

# Archive suffixes recognised in the cache
extensions:
  - pkg.tar.zst
  - pkg.tar.xz
  - pkg.tar.gz
  - pkg.tar.gzip

# Restrict accepted architectures (empty accepts any)
architectures: []

# Unparseable cache file names: error (abort) or warn (skip)
onMalformed: error

# Sort listed output
sort: false

# Output format: text, json, yaml
format: text
`;
}
