import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { AppConfig, AppConfigSchema, BridgeConfig, NotifyModeSchema, TodoProviderKindSchema } from '../types/index.js';
import { expandHome } from './home.js';
import { errorMessage } from './errors.js';

/**
 * Error thrown when the config file cannot be read or fails validation
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class ConfigManager {
    private configPath: string;
    private config: AppConfig;

    constructor(configPath: string, private env: NodeJS.ProcessEnv = process.env) {
        this.configPath = configPath;
        this.config = this.load();
    }

    /**
     * Load config from file, or create default if not exists
     */
    private load(): AppConfig {
        if (!existsSync(this.configPath)) {
            return AppConfigSchema.parse({});
        }

        let raw: unknown;
        try {
            raw = parseYaml(readFileSync(this.configPath, 'utf-8'));
        } catch (error) {
            throw new ConfigError(`Failed to parse ${this.configPath}: ${errorMessage(error)}`);
        }

        const result = AppConfigSchema.safeParse(raw ?? {});
        if (!result.success) {
            const issues = result.error.issues
                .map(issue => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('\n');
            throw new ConfigError(`Invalid config ${this.configPath}:\n${issues}`);
        }
        return result.data;
    }

    /**
     * Save config to file
     */
    save(): void {
        const dir = dirname(this.configPath);
        if (!existsSync(dir)) {
            mkdirSync(dir, { recursive: true });
        }
        writeFileSync(this.configPath, stringifyYaml(this.config), 'utf-8');
    }

    getConfigPath(): string {
        return this.configPath;
    }

    /**
     * Effective config: file values, environment overrides, paths expanded
     */
    getConfig(): AppConfig {
        const base = this.config;
        const env = this.env;

        const config: AppConfig = {
            ...base,
            providers: { ...base.providers },
            tool: { ...base.tool },
            webhook: { ...base.webhook },
            todoist: { ...base.todoist },
            sourceRoot: base.sourceRoot ? this.resolvePath(base.sourceRoot) : undefined,
            bridges: base.bridges.map(bridge => this.resolveBridge(bridge)),
        };

        if (env.NOTEBRIDGE_NOTIFY_MODE !== undefined) {
            const mode = NotifyModeSchema.safeParse(
                env.NOTEBRIDGE_NOTIFY_MODE.trim().replace(/^['"]|['"]$/g, '').toLowerCase()
            );
            config.notifyMode = mode.success ? mode.data : 'errors';
        }
        if (env.NOTEBRIDGE_TOOL) {
            config.tool.command = env.NOTEBRIDGE_TOOL;
        }
        if (env.NOTEBRIDGE_TODO_PROVIDER) {
            const kind = TodoProviderKindSchema.safeParse(env.NOTEBRIDGE_TODO_PROVIDER.trim().toLowerCase());
            config.providers.todo = kind.success ? kind.data : 'noop';
        }
        if (env.NOTEBRIDGE_TODOIST_API_TOKEN) {
            config.todoist.apiToken = env.NOTEBRIDGE_TODOIST_API_TOKEN.trim();
        }
        if (env.NOTEBRIDGE_WEBHOOK_URL) {
            config.webhook.url = env.NOTEBRIDGE_WEBHOOK_URL.trim();
            if (!config.providers.notifications.includes('webhook')) {
                config.providers.notifications = [...config.providers.notifications, 'webhook'];
            }
        }
        if (env.NOTEBRIDGE_HEALTHCHECK_URL) {
            config.healthcheckUrl = env.NOTEBRIDGE_HEALTHCHECK_URL.trim();
        }

        return config;
    }

    /**
     * Enabled bridges, optionally narrowed to one name
     */
    getEnabledBridges(name?: string): BridgeConfig[] {
        const bridges = this.getConfig().bridges.filter(bridge => bridge.enabled);
        if (!name) {
            return bridges;
        }
        const match = bridges.filter(bridge => bridge.name === name);
        if (match.length === 0) {
            throw new ConfigError(`Bridge '${name}' not found or disabled`);
        }
        return match;
    }

    private resolveBridge(bridge: BridgeConfig): BridgeConfig {
        return {
            ...bridge,
            sourcePath: bridge.sourcePath ? this.resolvePath(bridge.sourcePath) : undefined,
            vaultPath: this.resolvePath(bridge.vaultPath),
            tags: [...bridge.tags],
        };
    }

    /**
     * Expand ~ and resolve relative paths against the config file's directory
     */
    private resolvePath(path: string): string {
        const expanded = expandHome(path);
        return isAbsolute(expanded) ? expanded : resolve(dirname(this.configPath), expanded);
    }
}
