import Database from 'better-sqlite3';
import { describe, expect, it } from 'vitest';
import {
	DecodingError,
	DisambiguationError,
	DomainError,
	StoreError,
} from '../../src/domain/errors';
import { ErrorHandler, ErrorType } from '../../src/infrastructure/error/error-handler';
import { RecordingLogger } from '../helpers/fixture-store';

describe('ErrorHandler', () => {
	it('classifies domain errors by kind', () => {
		const handler = new ErrorHandler(new RecordingLogger());
		expect(handler.classify(new DisambiguationError('run', ['n', 'v']))).toBe(ErrorType.DISAMBIGUATION);
		expect(handler.classify(new DecodingError('x', 'bad'))).toBe(ErrorType.DECODING);
		expect(handler.classify(new DomainError('bad type'))).toBe(ErrorType.DOMAIN);
		expect(handler.classify(new StoreError('locked'))).toBe(ErrorType.STORAGE);
		expect(handler.classify(new Database.SqliteError('database is locked', 'SQLITE_BUSY'))).toBe(
			ErrorType.STORAGE,
		);
		expect(handler.classify(new TypeError('oops'))).toBe(ErrorType.SYSTEM);
	});

	it('returns the value of a successful operation', () => {
		const handler = new ErrorHandler(new RecordingLogger());
		expect(handler.execute(() => 5, 'count').data).toBe(5);
	});

	it('logs caller mistakes as warnings and keeps the original error', () => {
		const logger = new RecordingLogger();
		const handler = new ErrorHandler(logger);
		const error = new DisambiguationError('run', ['n', 'v']);

		const result = handler.execute(
			() => {
				throw error;
			},
			'lookup lemma',
			{ form: 'run' },
		);

		expect(result.error).toBe(error);
		expect(logger.entries).toHaveLength(1);
		expect(logger.entries[0]?.level).toBe('warn');
		expect(logger.entries[0]?.message).toBe(
			'Failed to lookup lemma: cannot disambiguate "run" between "n, v"',
		);
		expect(logger.entries[0]?.context).toMatchObject({
			type: ErrorType.DISAMBIGUATION,
			code: 'DISAMBIGUATION_LOOKUP_LEMMA_FAILED',
			context: { form: 'run' },
		});
	});

	it('logs store and unexpected faults as errors', () => {
		const logger = new RecordingLogger();
		const handler = new ErrorHandler(logger);

		handler.handleError(new StoreError('disk I/O error'), 'get synset');
		handler.handleError('plain string', 'get synset');

		expect(logger.messages('error')).toEqual([
			'Failed to get synset: disk I/O error',
			'Failed to get synset: plain string',
		]);
	});
});
