import { isAbsolute, resolve } from "node:path";
import { createApplyConfigResolver } from "./config/loader.js";
import { type ApplyConfigOverrides, withOverrides } from "./config/defaults.js";
import { applyAll, type ApplyOptions } from "./engine/applicator.js";
import type { ChangeSet } from "./input/envelope.js";
import type { ApplyConfig, ApplyRunResult } from "./types.js";

export interface RunChangeSetOptions extends ApplyOptions {
	cwd: string;
	/** Resolved against `cwd`; defaults to `cwd` */
	baseDir?: string;
	configPath?: string;
	/** Home directory searched for user config; defaults to the OS home */
	homeDir?: string;
	overrides?: ApplyConfigOverrides;
	/** Skips config discovery when given */
	config?: ApplyConfig;
	warn?: (message: string) => void;
}

export interface ChangeSetRun extends ApplyRunResult {
	baseDir: string;
	configSources: string[];
}

/** Resolve config for `cwd`, then apply every entry of the change set */
export function runChangeSet(changeSet: ChangeSet, options: RunChangeSetOptions): ChangeSetRun {
	const baseDir = options.baseDir
		? isAbsolute(options.baseDir)
			? options.baseDir
			: resolve(options.cwd, options.baseDir)
		: options.cwd;

	let config = options.config;
	let configSources: string[] = [];
	if (!config) {
		const resolved = createApplyConfigResolver({
			cwd: options.cwd,
			homeDir: options.homeDir,
			explicitConfigPath: options.configPath,
			warn: options.warn,
		}).resolve();
		config = resolved.config;
		configSources = resolved.sources;
	}
	if (options.overrides) {
		config = withOverrides(config, options.overrides);
	}

	options.log?.("info", `Applying ${changeSet.entries.length} file entries in ${baseDir}`);
	const run = applyAll(changeSet.entries, baseDir, config, {
		dryRun: options.dryRun,
		fileStore: options.fileStore,
		log: options.log,
	});
	return { ...run, baseDir, configSources };
}
