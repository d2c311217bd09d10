import { describe, it, expect, vi } from 'vitest';
import { decodeScopeConfig, defaultScopeConfig } from './scopeConfig';
import { ScopeConfigManager, type Logger } from './scopeConfigManager';

function createLogger(): Logger {
    return { warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

describe('decodeScopeConfig', () => {
    it('should expose the documented defaults', () => {
        expect(defaultScopeConfig).toEqual({
            timeScaleFactor: 4,
            ampScaleFactor: 2,
            ampTranslation: 0.5,
            strokeWidth: 7,
            strokeColor: '#000000',
            backgroundColor: null,
            evictOffscreenSamples: false,
            sampleOrder: 'permissive',
        });
    });

    it('should reject non-positive scale factors', () => {
        expect(() => decodeScopeConfig({ ...defaultScopeConfig, timeScaleFactor: 0 })).toThrow(TypeError);
        expect(() => decodeScopeConfig({ ...defaultScopeConfig, ampScaleFactor: Number.NaN })).toThrow(TypeError);
    });

    it('should strip unknown keys', () => {
        expect(decodeScopeConfig({ ...defaultScopeConfig, extra: true })).toEqual(defaultScopeConfig);
    });
});

describe('ScopeConfigManager', () => {
    it('should start from the defaults', () => {
        const manager = new ScopeConfigManager();

        expect(manager.config).toEqual(defaultScopeConfig);
        expect(manager.exportDelta()).toEqual({});
    });

    it('should merge an initial partial config over the defaults', () => {
        const manager = new ScopeConfigManager({ strokeWidth: 3, backgroundColor: '#202020' }, createLogger());

        expect(manager.config.strokeWidth).toBe(3);
        expect(manager.config.backgroundColor).toBe('#202020');
        expect(manager.config.timeScaleFactor).toBe(4);
    });

    it('should apply valid keys and skip invalid or unknown ones', () => {
        const logger = createLogger();
        const manager = new ScopeConfigManager(undefined, logger);

        const config = manager.merge({ strokeWidth: -1, ampScaleFactor: 3, bogus: 1 });

        expect(config.strokeWidth).toBe(7);
        expect(config.ampScaleFactor).toBe(3);
        expect(logger.warn).toHaveBeenCalledTimes(2);
        expect(logger.warn).toHaveBeenCalledWith('Ignoring invalid value for scope config key "strokeWidth":', -1);
        expect(logger.warn).toHaveBeenCalledWith('Ignoring unknown scope config key "bogus"');
    });

    it('should ignore a delta that is not an object', () => {
        const logger = createLogger();
        const manager = new ScopeConfigManager(undefined, logger);
        const callback = vi.fn();
        manager.onConfigChanged(callback);

        manager.merge('fast');

        expect(manager.config).toEqual(defaultScopeConfig);
        expect(callback).not.toHaveBeenCalled();
        expect(logger.warn).toHaveBeenCalledWith('Ignoring scope config that is not an object:', 'fast');
    });

    it('should throw on an invalid update and keep the current config', () => {
        const manager = new ScopeConfigManager(undefined, createLogger());

        expect(() => manager.update({ strokeColor: 'red' })).toThrow(
            new TypeError('Invalid scope config value for strokeColor')
        );
        expect(manager.config.strokeColor).toBe('#000000');
    });

    it('should notify subscribers with the new and previous config', () => {
        const manager = new ScopeConfigManager(undefined, createLogger());
        const callback = vi.fn();
        const unsubscribe = manager.onConfigChanged(callback);

        manager.update({ timeScaleFactor: 8 });
        unsubscribe();
        manager.update({ timeScaleFactor: 2 });

        expect(callback).toHaveBeenCalledTimes(1);
        const [next, previous] = callback.mock.calls[0];
        expect(next.timeScaleFactor).toBe(8);
        expect(previous.timeScaleFactor).toBe(4);
    });

    it('should log a failing subscriber and keep notifying the others', () => {
        const logger = createLogger();
        const manager = new ScopeConfigManager(undefined, logger);
        const failure = new Error('subscriber failed');
        const second = vi.fn();
        manager.onConfigChanged(() => {
            throw failure;
        });
        manager.onConfigChanged(second);

        manager.update({ strokeWidth: 2 });

        expect(second).toHaveBeenCalledTimes(1);
        expect(logger.error).toHaveBeenCalledWith('Error in config change callback:', failure);
    });

    it('should export only values that differ from the defaults and reset them', () => {
        const manager = new ScopeConfigManager(undefined, createLogger());
        manager.update({ strokeColor: '#ff0000', sampleOrder: 'strict' });

        expect(manager.exportDelta()).toEqual({ strokeColor: '#ff0000', sampleOrder: 'strict' });

        manager.reset();
        expect(manager.config).toEqual(defaultScopeConfig);
        expect(manager.exportDelta()).toEqual({});
    });
});
