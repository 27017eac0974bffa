import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import * as YAML from 'yaml';
import { removePackages } from '../core/actions';
import { planCleanup } from '../core/planner';
import { SelectionMode } from '../types';
import {
	generateExampleConfig,
	loadConfig,
	mergeWithCliOptions,
	OUTPUT_FORMATS,
	type OutputFormat,
	type PacleanConfig,
} from '../utils/config';
import { DeletionPermissionDeniedError, PacleanError } from '../utils/errors';
import {
	formatDeletionReport,
	formatDeletionSummary,
	formatSelectionAsText,
	render,
	selectionHeading,
	type SelectionOutput,
	serializeEntry,
} from '../utils/formatter';
import { type Logger, LogLevel, logger } from '../utils/logger';

export const EXIT = {
	OK: 0,
	FAILURE: 1,
	USAGE: 2,
	PERMISSION_DENIED: 3,
} as const;

export interface CliContext {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	log: Logger;
	cwd: string;
	env: NodeJS.ProcessEnv;
}

type GlobalOptions = {
	cachePath?: string;
	installedPath?: string;
	number?: number;
	sort?: boolean;
	format?: OutputFormat;
	onMalformed?: PacleanConfig['onMalformed'];
	config?: string;
	quiet?: boolean;
	verbose?: boolean;
};

type RootOptions = GlobalOptions & {
	uninstalled?: boolean;
	moreThan?: boolean;
	delete?: boolean;
	dryRun?: boolean;
};

function parseKeep(value: string): number {
	if (!/^\d+$/.test(value)) {
		throw new InvalidArgumentError('Expected a non-negative integer.');
	}
	return Number.parseInt(value, 10);
}

function applyLogLevel(log: Logger, opts: { quiet?: boolean; verbose?: boolean }): void {
	if (opts.verbose) log.setLevel(LogLevel.DEBUG);
	else if (opts.quiet) log.setLevel(LogLevel.ERROR);
}

function resolveConfig(opts: GlobalOptions, ctx: CliContext): { config: PacleanConfig; source: string | null } {
	const { config, source } = loadConfig({ cwd: ctx.cwd, configFile: opts.config, env: ctx.env });
	const merged = mergeWithCliOptions(config, {
		cachePath: opts.cachePath,
		installedPath: opts.installedPath,
		keep: opts.number,
		sort: opts.sort,
		format: opts.format,
		onMalformed: opts.onMalformed,
		quiet: opts.quiet,
		verbose: opts.verbose,
	});
	applyLogLevel(ctx.log, merged);
	if (source) ctx.log.debug(`config loaded from ${source}`);
	return { config: merged, source };
}

export function createProgram(ctx: CliContext): Command {
	const program = new Command();
	program
		.name('paclean')
		.description('Clean up pacman\'s package cache. More flexible than "pacman -Sc[c]"')
		.version('1.0.0')
		.option('-u, --uninstalled', 'select cached packages that are not installed')
		.option('-m, --more-than', 'select cached versions beyond the number to keep')
		.option('--delete', 'delete the selected files instead of listing them')
		.option('--dry-run', 'with --delete, report what would be deleted without deleting')
		.option('-n, --number <n>', 'number of cached versions to keep per installed package (default: 2)', parseKeep)
		.option('-c, --cache-path <path>', 'package cache directory')
		.option('-i, --installed-path <path>', 'installed package database')
		.option('-s, --sort', 'sort listed packages by name, version and release')
		.addOption(new Option('-f, --format <format>', 'output format').choices(OUTPUT_FORMATS))
		.addOption(new Option('--on-malformed <policy>', 'unparseable cache file names').choices(['error', 'warn']))
		.option('--config <file>', 'config file to use instead of searching for .pacleanrc')
		.option('-q, --quiet', 'only print errors')
		.option('-v, --verbose', 'verbose logging')
		.configureOutput({
			writeOut: (str) => ctx.stdout(str.trimEnd()),
			writeErr: (str) => ctx.stderr(str.trimEnd()),
		})
		.exitOverride();

	program.hook('preAction', (_, actionCommand) => {
		applyLogLevel(ctx.log, actionCommand.optsWithGlobals<GlobalOptions>());
	});

	program.action((opts: RootOptions) => {
		const modes: SelectionMode[] = [];
		if (opts.uninstalled) modes.push(SelectionMode.UNINSTALLED);
		if (opts.moreThan) modes.push(SelectionMode.EXCESS);
		if (!modes.length) {
			program.error('error: need to specify -u, -m or both', { exitCode: EXIT.USAGE });
		}
		if (opts.dryRun && !opts.delete) {
			program.error('error: --dry-run only applies together with --delete', { exitCode: EXIT.USAGE });
		}

		const { config } = resolveConfig(opts, ctx);
		const plan = planCleanup(config, modes, ctx.log);

		if (!opts.delete) {
			if (config.format === 'text') {
				if (opts.uninstalled) {
					ctx.log.debug(selectionHeading('Not installed', plan.uninstalled.length));
					formatSelectionAsText(plan.uninstalled).forEach((line) => ctx.stdout(line));
				}
				if (opts.moreThan) {
					ctx.log.debug(selectionHeading(`More than ${config.keep} cached`, plan.excess.length));
					formatSelectionAsText(plan.excess).forEach((line) => ctx.stdout(line));
				}
				return;
			}

			const data: SelectionOutput = {};
			if (opts.uninstalled) data.uninstalled = plan.uninstalled.map(serializeEntry);
			if (opts.moreThan) data.excess = plan.excess.map(serializeEntry);
			ctx.stdout(render(data, config.format).trimEnd());
			return;
		}

		const report = removePackages([...plan.uninstalled, ...plan.excess], {
			log: ctx.log,
			dryRun: opts.dryRun,
		});

		if (config.format === 'text') {
			const summary = formatDeletionSummary(report);
			ctx.log.success(opts.dryRun ? `${summary} (dry run)` : summary);
		} else {
			ctx.stdout(render(formatDeletionReport(report), config.format).trimEnd());
		}
	});

	program
		.command('config')
		.description('Print the resolved configuration and where it came from')
		.option('--example', 'print an example .pacleanrc.yaml instead', false)
		.action((opts: { example: boolean }, cmd: Command) => {
			if (opts.example) {
				ctx.stdout(generateExampleConfig().trimEnd());
				return;
			}

			const { config, source } = resolveConfig(cmd.optsWithGlobals<GlobalOptions>(), ctx);
			if (config.format === 'json') {
				ctx.stdout(JSON.stringify({ source, config }, null, 2));
			} else {
				ctx.stdout(`# source: ${source ?? 'defaults'}`);
				ctx.stdout(YAML.stringify(config).trimEnd());
			}
		});

	return program;
}

/**
 * Run the CLI against the given arguments (without the node and script
 * entries) and return the process exit code.
 */
export function run(argv: string[], overrides: Partial<CliContext> = {}): number {
	const ctx: CliContext = {
		stdout: (text) => process.stdout.write(text + '\n'),
		stderr: (text) => process.stderr.write(text + '\n'),
		log: logger,
		cwd: process.cwd(),
		env: process.env,
		...overrides,
	};

	const program = createProgram(ctx);

	try {
		program.parse(argv, { from: 'user' });
		return EXIT.OK;
	} catch (error) {
		if (error instanceof CommanderError) {
			// --help and --version also arrive here, with exit code 0
			return error.exitCode === 0 ? EXIT.OK : EXIT.USAGE;
		}
		if (error instanceof DeletionPermissionDeniedError) {
			ctx.log.error(error.message);
			ctx.stderr(chalk.yellow(error.hint));
			return EXIT.PERMISSION_DENIED;
		}
		if (error instanceof PacleanError) {
			ctx.log.error(error.message);
			return EXIT.FAILURE;
		}
		throw error;
	}
}
