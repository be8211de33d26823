import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, LogLevel, globalLogger, getLogger, type LogEntry } from './logger';

const silenceConsole = () => ({
	log: vi.spyOn(console, 'log').mockImplementation(() => {}),
	warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
	error: vi.spyOn(console, 'error').mockImplementation(() => {}),
	debug: vi.spyOn(console, 'debug').mockImplementation(() => {})
});

describe('Logger', () => {
	let consoleSpy: ReturnType<typeof silenceConsole>;

	beforeEach(() => {
		consoleSpy = silenceConsole();
	});

	afterEach(() => {
		vi.restoreAllMocks();
		vi.useRealTimers();
		globalLogger.configure({ level: LogLevel.INFO, console: true });
	});

	const logEverything = (logger: Logger) => {
		logger.debug('debug message');
		logger.info('info message');
		logger.warn('warn message');
		logger.error('error message');
	};

	describe('level filtering', () => {
		it('emits nothing at OFF', () => {
			logEverything(new Logger({ level: LogLevel.OFF }));

			expect(consoleSpy.debug).not.toHaveBeenCalled();
			expect(consoleSpy.log).not.toHaveBeenCalled();
			expect(consoleSpy.warn).not.toHaveBeenCalled();
			expect(consoleSpy.error).not.toHaveBeenCalled();
		});

		it('emits warnings and errors at WARN', () => {
			logEverything(new Logger({ level: LogLevel.WARN }));

			expect(consoleSpy.debug).not.toHaveBeenCalled();
			expect(consoleSpy.log).not.toHaveBeenCalled();
			expect(consoleSpy.warn).toHaveBeenCalledOnce();
			expect(consoleSpy.error).toHaveBeenCalledOnce();
		});

		it('defaults to INFO', () => {
			logEverything(new Logger());

			expect(consoleSpy.debug).not.toHaveBeenCalled();
			expect(consoleSpy.log).toHaveBeenCalledOnce();
			expect(consoleSpy.warn).toHaveBeenCalledOnce();
			expect(consoleSpy.error).toHaveBeenCalledOnce();
		});

		it('routes every level to its console method at ALL', () => {
			logEverything(new Logger({ level: LogLevel.ALL }));

			expect(consoleSpy.debug).toHaveBeenCalledWith(expect.stringContaining('debug message'));
			expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('info message'));
			expect(consoleSpy.warn).toHaveBeenCalledWith(expect.stringContaining('warn message'));
			expect(consoleSpy.error).toHaveBeenCalledWith(expect.stringContaining('error message'));
		});

		it('reports whether a level is enabled', () => {
			const logger = new Logger({ level: LogLevel.WARN });

			expect(logger.isLevelEnabled(LogLevel.INFO)).toBe(false);
			expect(logger.isLevelEnabled(LogLevel.ERROR)).toBe(true);

			logger.setLevel(LogLevel.OFF);
			expect(logger.getLevel()).toBe(LogLevel.OFF);
			expect(logger.isLevelEnabled(LogLevel.ERROR)).toBe(false);
		});
	});

	describe('formatting', () => {
		it('writes timestamp, padded level, context, message and data', () => {
			vi.useFakeTimers();
			vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
			const logger = new Logger();

			logger.info('Rendering query', 'SQLRenderer', { target: 'users' });

			expect(consoleSpy.log).toHaveBeenCalledWith(
				'2026-01-02T03:04:05.000Z INFO  [SQLRenderer] Rendering query {"target":"users"}'
			);
		});

		it('omits context and data when absent', () => {
			vi.useFakeTimers();
			vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
			const logger = new Logger();

			logger.error('boom');

			expect(consoleSpy.error).toHaveBeenCalledWith('2026-01-02T03:04:05.000Z ERROR boom');
		});

		it('uses a custom formatter', () => {
			const logger = new Logger({ formatter: (entry) => `${LogLevel[entry.level]}:${entry.message}` });

			logger.warn('careful');

			expect(consoleSpy.warn).toHaveBeenCalledWith('WARN:careful');
		});
	});

	describe('configuration', () => {
		it('sends entries to a custom handler instead of the console', () => {
			const handler = vi.fn<(entry: LogEntry) => void>();
			const logger = new Logger({ handler });

			logger.info('built', 'QueryBuilder', { conditions: 2 });

			expect(handler).toHaveBeenCalledWith({
				timestamp: expect.any(Date),
				level: LogLevel.INFO,
				message: 'built',
				context: 'QueryBuilder',
				data: { conditions: 2 }
			});
			expect(consoleSpy.log).not.toHaveBeenCalled();
		});

		it('keeps unspecified settings when reconfigured', () => {
			const logger = new Logger({ level: LogLevel.ERROR, formatter: (entry) => entry.message });

			logger.info('hidden');
			logger.configure({ level: LogLevel.INFO });
			logger.info('shown');

			expect(consoleSpy.log).toHaveBeenCalledOnce();
			expect(consoleSpy.log).toHaveBeenCalledWith('shown');
		});

		it('stays silent with console output disabled', () => {
			const logger = new Logger({ console: false });

			logger.error('not printed');

			expect(consoleSpy.error).not.toHaveBeenCalled();
		});
	});

	describe('getLogger', () => {
		it('binds a context and writes through the global logger', () => {
			const debug = vi.spyOn(globalLogger, 'debug');
			const warn = vi.spyOn(globalLogger, 'warn');

			const logger = getLogger('Catalog');
			logger.debug('Generated AST', { verb: 'get' });
			logger.warn('Careful');

			expect(debug).toHaveBeenCalledWith('Generated AST', 'Catalog', { verb: 'get' });
			expect(warn).toHaveBeenCalledWith('Careful', 'Catalog', undefined);
		});

		it('is silenced by the global level', () => {
			globalLogger.configure({ level: LogLevel.ERROR });

			getLogger('Validator').warn('AST validation failed');

			expect(consoleSpy.warn).not.toHaveBeenCalled();
		});
	});
});
