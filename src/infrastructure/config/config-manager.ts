import { z } from 'zod';
import { LANGUAGES, type Language } from '../../domain/constants/languages';

const LOG_LEVEL_NAMES = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

/**
 * Application configuration interface
 */
export interface AppConfig {
	store: StoreConfig;
	cache: CacheConfig;
	logging: LoggingConfig;
	server: ServerConfig;
	defaults: DefaultsConfig;
}

/**
 * Store configuration. `database` selects the single-file layout and wins
 * over `dataDir`.
 */
export interface StoreConfig {
	dataDir: string;
	database?: string;
}

/**
 * Cache configuration
 */
export interface CacheConfig {
	maxEntries: number;
}

/**
 * Logging configuration
 */
export interface LoggingConfig {
	level: (typeof LOG_LEVEL_NAMES)[number];
}

/**
 * MCP server configuration
 */
export interface ServerConfig {
	name: string;
	version: string;
	resultLimit: number;
}

/**
 * Defaults applied when a request names no language
 */
export interface DefaultsConfig {
	language: Language;
}

/**
 * Default application configuration
 */
export const DEFAULT_APP_CONFIG: AppConfig = {
	store: {
		dataDir: 'data'
	},
	cache: {
		maxEntries: 2048
	},
	logging: {
		level: 'INFO'
	},
	server: {
		name: 'wordnet-navigator',
		version: '0.1.0',
		resultLimit: 25
	},
	defaults: {
		language: 'english'
	}
};

const environmentSchema = z.object({
	WORDNET_DATA_DIR: z.string().min(1).optional(),
	WORDNET_DATABASE: z.string().min(1).optional(),
	WORDNET_LANGUAGE: z.enum(LANGUAGES).optional(),
	WORDNET_CACHE_SIZE: z.coerce.number().int().nonnegative().optional(),
	LOG_LEVEL: z
		.string()
		.transform((value) => value.toUpperCase())
		.pipe(z.enum(LOG_LEVEL_NAMES))
		.optional()
});

/**
 * Configuration manager for centralized configuration access
 */
export class ConfigManager {
	private config: AppConfig;

	constructor(customConfig?: Partial<AppConfig>) {
		this.config = this.mergeConfig(DEFAULT_APP_CONFIG, customConfig);
	}

	/**
	 * Get the complete configuration
	 */
	getConfig(): AppConfig {
		return { ...this.config };
	}

	getStoreConfig(): StoreConfig {
		return { ...this.config.store };
	}

	getCacheConfig(): CacheConfig {
		return { ...this.config.cache };
	}

	getLoggingConfig(): LoggingConfig {
		return { ...this.config.logging };
	}

	getServerConfig(): ServerConfig {
		return { ...this.config.server };
	}

	getDefaultsConfig(): DefaultsConfig {
		return { ...this.config.defaults };
	}

	/**
	 * Update configuration at runtime (for testing or dynamic config)
	 */
	updateConfig(updates: Partial<AppConfig>): void {
		this.config = this.mergeConfig(this.config, updates);
	}

	/**
	 * Create configuration from environment variables. Unset variables keep
	 * their defaults; malformed ones throw.
	 */
	static fromEnvironment(env: Record<string, string | undefined> = {}): ConfigManager {
		const parsed = environmentSchema.safeParse(env);
		if (!parsed.success) {
			const details = parsed.error.issues
				.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
				.join('; ');
			throw new Error(`Invalid environment configuration: ${details}`);
		}

		const vars = parsed.data;
		const envConfig: Partial<AppConfig> = {};

		if (vars.WORDNET_DATA_DIR || vars.WORDNET_DATABASE) {
			envConfig.store = {
				dataDir: vars.WORDNET_DATA_DIR ?? DEFAULT_APP_CONFIG.store.dataDir,
				database: vars.WORDNET_DATABASE
			};
		}

		if (vars.WORDNET_CACHE_SIZE !== undefined) {
			envConfig.cache = { maxEntries: vars.WORDNET_CACHE_SIZE };
		}

		if (vars.LOG_LEVEL) {
			envConfig.logging = { level: vars.LOG_LEVEL };
		}

		if (vars.WORDNET_LANGUAGE) {
			envConfig.defaults = { language: vars.WORDNET_LANGUAGE };
		}

		return new ConfigManager(envConfig);
	}

	/**
	 * Merge configuration objects section by section
	 */
	private mergeConfig(base: AppConfig, override?: Partial<AppConfig>): AppConfig {
		if (!override) return base;

		return {
			store: { ...base.store, ...override.store },
			cache: { ...base.cache, ...override.cache },
			logging: { ...base.logging, ...override.logging },
			server: { ...base.server, ...override.server },
			defaults: { ...base.defaults, ...override.defaults }
		};
	}
}
