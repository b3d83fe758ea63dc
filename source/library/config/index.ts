import fs from 'node:fs/promises';
import {z} from 'zod';
import {
	DEFAULT_EMBEDDING_DIMENSIONS,
	EMBEDDING_PROVIDER_ENV,
	SUPPORTED_EXTENSIONS,
	getConfigPath,
} from '../constants.js';
import {
	OPENAI_API_BASE,
	OPENAI_DEFAULT_DIMENSIONS,
	OPENAI_DEFAULT_MODEL,
} from '../embeddings/openai.js';
import type {Logger} from '../logger/index.js';

/**
 * Embedding provider types.
 * - openai: any OpenAI-compatible /embeddings endpoint (needs network)
 * - mock: deterministic hash vectors, offline; the default
 */
export const embeddingProviderSchema = z.enum(['openai', 'mock']);

export type EmbeddingProviderType = z.infer<typeof embeddingProviderSchema>;

/**
 * Persisted shape of `<library>/config.json`.
 * Every field is optional on disk; missing fields fall back to DEFAULT_CONFIG.
 */
const configFileSchema = z
	.object({
		version: z.number().int(),
		embeddingProvider: embeddingProviderSchema,
		embeddingModel: z.string().min(1),
		embeddingDimensions: z.number().int().positive(),
		embeddingBaseUrl: z.string().url(),
		chunkSize: z.number().int().positive(),
		chunkOverlap: z.number().int().nonnegative(),
		extensions: z.array(z.string().startsWith('.')),
		lockTimeoutMs: z.number().int().nonnegative().nullable(),
		lockPollIntervalMs: z.number().int().positive(),
		lockStaleMs: z.number().int().min(5000),
		searchLimit: z.number().int().positive(),
	})
	.partial();

export interface LibraryConfig {
	version: number;
	embeddingProvider: EmbeddingProviderType;
	embeddingModel: string;
	embeddingDimensions: number;
	/** Root of the OpenAI-compatible API used by the openai provider */
	embeddingBaseUrl: string;
	/** Maximum characters per chunk (default: 1000) */
	chunkSize: number;
	/** Characters shared by consecutive chunks (default: 200) */
	chunkOverlap: number;
	/** Book file extensions picked up by directory scans */
	extensions: string[];
	/** How long to wait for the library lock; null waits forever */
	lockTimeoutMs: number | null;
	/** Delay between lock attempts while another process holds it (default: 500ms) */
	lockPollIntervalMs: number;
	/** Age after which an unrefreshed lock is considered abandoned (default: 10s) */
	lockStaleMs: number;
	/** Books returned per search (default: 5) */
	searchLimit: number;
}

/**
 * Provider-specific embedding configurations.
 */
export const PROVIDER_CONFIGS: Record<
	EmbeddingProviderType,
	{model: string; dimensions: number}
> = {
	openai: {
		model: OPENAI_DEFAULT_MODEL,
		dimensions: OPENAI_DEFAULT_DIMENSIONS,
	},
	mock: {
		model: 'mock-hash',
		dimensions: DEFAULT_EMBEDDING_DIMENSIONS,
	},
};

export const DEFAULT_CONFIG: LibraryConfig = {
	version: 1,
	embeddingProvider: 'mock',
	embeddingModel: PROVIDER_CONFIGS['mock'].model,
	embeddingDimensions: PROVIDER_CONFIGS['mock'].dimensions,
	embeddingBaseUrl: OPENAI_API_BASE,
	chunkSize: 1000,
	chunkOverlap: 200,
	extensions: [...SUPPORTED_EXTENSIONS],
	lockTimeoutMs: null,
	lockPollIntervalMs: 500,
	lockStaleMs: 10_000,
	searchLimit: 5,
};

/**
 * Create config for a specific provider.
 */
export function createConfigForProvider(
	provider: EmbeddingProviderType,
): LibraryConfig {
	const providerConfig = PROVIDER_CONFIGS[provider];
	return {
		...DEFAULT_CONFIG,
		embeddingProvider: provider,
		embeddingModel: providerConfig.model,
		embeddingDimensions: providerConfig.dimensions,
	};
}

/**
 * Apply the BOOKSHELF_EMBEDDING_PROVIDER override, if set to a known provider.
 */
function applyEnvironment(config: LibraryConfig): LibraryConfig {
	const override = embeddingProviderSchema.safeParse(
		process.env[EMBEDDING_PROVIDER_ENV],
	);
	if (!override.success || override.data === config.embeddingProvider) {
		return config;
	}
	const providerConfig = PROVIDER_CONFIGS[override.data];
	return {
		...config,
		embeddingProvider: override.data,
		embeddingModel: providerConfig.model,
		embeddingDimensions: providerConfig.dimensions,
	};
}

/**
 * Load config from disk, merging with defaults.
 * Returns DEFAULT_CONFIG if no config file exists or the file is invalid.
 */
export async function loadConfig(
	libraryRoot: string,
	logger?: Logger,
): Promise<LibraryConfig> {
	const configPath = getConfigPath(libraryRoot);

	let content: string;
	try {
		content = await fs.readFile(configPath, 'utf-8');
	} catch {
		return applyEnvironment({...DEFAULT_CONFIG});
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error) {
		logger?.warn('Config', `Ignoring unreadable config at ${configPath}`, {
			error: String(error),
		});
		return applyEnvironment({...DEFAULT_CONFIG});
	}

	const parsed = configFileSchema.safeParse(raw);
	if (!parsed.success) {
		logger?.warn('Config', `Ignoring invalid config at ${configPath}`, {
			issues: parsed.error.issues.map(
				issue => `${issue.path.join('.')}: ${issue.message}`,
			),
		});
		return applyEnvironment({...DEFAULT_CONFIG});
	}

	return applyEnvironment({...DEFAULT_CONFIG, ...parsed.data});
}

/**
 * Save config to disk.
 * Creates the library directory if it doesn't exist.
 */
export async function saveConfig(
	libraryRoot: string,
	config: LibraryConfig,
): Promise<void> {
	await fs.mkdir(libraryRoot, {recursive: true});
	await fs.writeFile(
		getConfigPath(libraryRoot),
		JSON.stringify(config, null, '\t') + '\n',
	);
}

/**
 * Check if a config file exists.
 */
export async function configExists(libraryRoot: string): Promise<boolean> {
	try {
		await fs.access(getConfigPath(libraryRoot));
		return true;
	} catch {
		return false;
	}
}
