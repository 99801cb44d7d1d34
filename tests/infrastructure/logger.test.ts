import { describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, LogLevel, logLevelFrom } from '../../src/infrastructure/logging/logger';

describe('ConsoleLogger', () => {
	it('writes level-prefixed lines at or above its level', () => {
		const writer = vi.fn();
		const logger = new ConsoleLogger(LogLevel.WARN, writer);

		logger.debug('hidden');
		logger.info('hidden');
		logger.warn('careful', { id: 'n#02084071' });
		logger.error('broken');

		expect(writer.mock.calls).toEqual([
			['[WARN] careful', { id: 'n#02084071' }],
			['[ERROR] broken', ''],
		]);
	});

	it('writes to stderr by default', () => {
		const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
		new ConsoleLogger(LogLevel.INFO).info('started');
		expect(errorSpy).toHaveBeenCalledWith('[INFO] started', '');
		errorSpy.mockRestore();
	});
});

describe('logLevelFrom', () => {
	it('maps configured names case-insensitively', () => {
		expect(logLevelFrom('DEBUG')).toBe(LogLevel.DEBUG);
		expect(logLevelFrom('warn')).toBe(LogLevel.WARN);
	});

	it('falls back to info for unknown names', () => {
		expect(logLevelFrom('verbose')).toBe(LogLevel.INFO);
	});
});
