import * as t from 'io-ts';
import { isRight } from 'fp-ts/Either';
import { PathReporter } from 'io-ts/PathReporter';

export interface PositiveBrand {
    readonly Positive: unique symbol;
}

// eslint-disable-next-line @typescript-eslint/naming-convention
export const Positive = t.brand(
    t.number,
    (n): n is t.Branded<number, PositiveBrand> => Number.isFinite(n) && n > 0,
    'Positive'
);

export interface FiniteBrand {
    readonly Finite: unique symbol;
}

// eslint-disable-next-line @typescript-eslint/naming-convention
export const Finite = t.brand(
    t.number,
    (n): n is t.Branded<number, FiniteBrand> => Number.isFinite(n),
    'Finite'
);

export interface HexColorBrand {
    readonly HexColor: unique symbol;
}

// eslint-disable-next-line @typescript-eslint/naming-convention
export const HexColor = t.brand(
    t.string,
    (s): s is t.Branded<string, HexColorBrand> => /^#([0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/.test(s),
    'HexColor'
);

export const scopeConfigSchema = t.exact(t.type({
    timeScaleFactor: Positive,
    ampScaleFactor: Positive,
    ampTranslation: Finite,
    strokeWidth: Positive,
    strokeColor: HexColor,
    backgroundColor: t.union([HexColor, t.null]),
    evictOffscreenSamples: t.boolean,
    sampleOrder: t.union([
        t.literal('permissive'),
        t.literal('strict'),
    ]),
}));

export type ScopeConfig = t.TypeOf<typeof scopeConfigSchema>;
export type ScopeConfigKey = keyof ScopeConfig;

export function isScopeConfigKey(key: string): key is ScopeConfigKey {
    return Object.hasOwn(scopeConfigSchema.type.props, key);
}

export function decodeScopeConfig(input: unknown): ScopeConfig {
    const result = scopeConfigSchema.decode(input);
    if (isRight(result)) {
        return result.right;
    }
    throw new TypeError(`Invalid scope config: ${PathReporter.report(result).join('; ')}`);
}

export const defaultScopeConfig: Readonly<ScopeConfig> = Object.freeze(decodeScopeConfig({
    timeScaleFactor: 4,
    ampScaleFactor: 2,
    ampTranslation: 0.5,
    strokeWidth: 7,
    strokeColor: '#000000',
    backgroundColor: null,
    evictOffscreenSamples: false,
    sampleOrder: 'permissive',
}));
