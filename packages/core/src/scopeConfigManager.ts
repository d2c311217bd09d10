import { isRight } from 'fp-ts/Either';
import { defaultScopeConfig, isScopeConfigKey, scopeConfigSchema, type ScopeConfig } from './scopeConfig';

export type Logger = Pick<Console, 'warn' | 'error' | 'debug'>;

export interface ConfigChangeCallback {
    (newConfig: Readonly<ScopeConfig>, oldConfig: Readonly<ScopeConfig>): void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function computeDelta(config: ScopeConfig, defaults: ScopeConfig): Partial<ScopeConfig> {
    const delta: Partial<ScopeConfig> = {};
    for (const key of Object.keys(config)) {
        if (isScopeConfigKey(key) && config[key] !== defaults[key]) {
            Object.assign(delta, { [key]: config[key] });
        }
    }
    return delta;
}

/**
 * Merges `delta` over `base`. When the merged whole does not validate, each key
 * is tried on its own and the ones that fail keep their value from `base`.
 */
function validateAndMerge(base: ScopeConfig, delta: unknown, logger: Logger): ScopeConfig {
    if (!isRecord(delta)) {
        logger.warn('Ignoring scope config that is not an object:', delta);
        return base;
    }

    const keys = Object.keys(delta);
    for (const key of keys) {
        if (!isScopeConfigKey(key)) {
            logger.warn(`Ignoring unknown scope config key "${key}"`);
        }
    }

    const fullValidation = scopeConfigSchema.decode({ ...base, ...delta });
    if (isRight(fullValidation)) {
        return fullValidation.right;
    }

    let result = base;
    for (const key of keys) {
        if (!isScopeConfigKey(key)) continue;
        const validation = scopeConfigSchema.decode({ ...result, [key]: delta[key] });
        if (isRight(validation)) {
            result = validation.right;
        } else {
            logger.warn(`Ignoring invalid value for scope config key "${key}":`, delta[key]);
        }
    }
    return result;
}

export class ScopeConfigManager {
    private _config: ScopeConfig;
    private changeCallbacks: ConfigChangeCallback[] = [];

    constructor(initial?: unknown, private readonly logger: Logger = console) {
        this._config = initial === undefined
            ? { ...defaultScopeConfig }
            : validateAndMerge({ ...defaultScopeConfig }, initial, logger);
    }

    get config(): Readonly<ScopeConfig> {
        return this._config;
    }

    onConfigChanged(callback: ConfigChangeCallback): () => void {
        this.changeCallbacks.push(callback);
        return () => {
            this.changeCallbacks = this.changeCallbacks.filter(c => c !== callback);
        };
    }

    /** Applies the valid keys of `delta`, logging and skipping the rest. */
    merge(delta: unknown): Readonly<ScopeConfig> {
        const next = validateAndMerge(this._config, delta, this.logger);
        if (next !== this._config) {
            this.apply(next);
        }
        return this._config;
    }

    /** Applies `delta` only if every key validates; throws otherwise. */
    update(delta: Partial<Record<keyof ScopeConfig, unknown>>): Readonly<ScopeConfig> {
        const validation = scopeConfigSchema.decode({ ...this._config, ...delta });
        if (!isRight(validation)) {
            const keys = validation.left.map(error => error.context[1]?.key ?? '<root>');
            throw new TypeError(`Invalid scope config value for ${[...new Set(keys)].join(', ')}`);
        }
        this.apply(validation.right);
        return this._config;
    }

    exportDelta(): Partial<ScopeConfig> {
        return computeDelta(this._config, defaultScopeConfig);
    }

    reset(): void {
        this.apply({ ...defaultScopeConfig });
    }

    private apply(next: ScopeConfig): void {
        const oldConfig = this._config;
        this._config = next;
        for (const callback of this.changeCallbacks) {
            try {
                callback(next, oldConfig);
            } catch (error) {
                this.logger.error('Error in config change callback:', error);
            }
        }
    }
}
