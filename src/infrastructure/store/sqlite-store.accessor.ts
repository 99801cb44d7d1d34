import Database from 'better-sqlite3';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { StoreSpace } from '../../domain/constants/languages';
import { StoreError } from '../../domain/errors';
import type {
	ColumnMatch,
	StoreAccessor,
	StoreQuery,
	StoreRow,
	TableName,
} from '../../domain/ports/store-accessor';
import { SilentLogger, type ILogger } from '../logging/logger';

type Handle = Database.Database;

/**
 * Maps a table to the database holding it, or `undefined` when no database
 * file exists for it
 */
type HandleLocator = (space: StoreSpace, table: TableName) => Handle | undefined;

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/i;

/**
 * Read-only store accessor over SQLite databases. Tables are named
 * `<space>_<table>`, either all in one database or one database file per table.
 */
export class SqliteStoreAccessor implements StoreAccessor {
	private readonly presence = new Map<string, boolean>();
	private readonly statements = new Map<string, Database.Statement>();

	private constructor(
		private readonly locate: HandleLocator,
		private readonly release: () => void,
		private readonly logger: ILogger,
	) {}

	/**
	 * Accessor over a single database holding every table
	 */
	static fromDatabase(db: Handle, logger: ILogger = new SilentLogger()): SqliteStoreAccessor {
		return new SqliteStoreAccessor(
			() => db,
			() => db.close(),
			logger,
		);
	}

	/**
	 * Accessor over the distributed layout `<dir>/<space>/<space>_<table>.db`.
	 * Files are opened read-only on first use.
	 */
	static fromDirectory(directory: string, logger: ILogger = new SilentLogger()): SqliteStoreAccessor {
		const handles = new Map<string, Handle | undefined>();

		const locate: HandleLocator = (space, table) => {
			const name = `${space}_${table}`;
			if (!handles.has(name)) {
				const file = join(directory, space, `${name}.db`);
				const handle = existsSync(file)
					? new Database(file, { readonly: true, fileMustExist: true })
					: undefined;
				handles.set(name, handle);
				logger.debug('Opened store file', { file, present: handle !== undefined });
			}
			return handles.get(name);
		};

		const release = () => {
			for (const handle of handles.values()) {
				handle?.close();
			}
			handles.clear();
		};

		return new SqliteStoreAccessor(locate, release, logger);
	}

	query(space: StoreSpace, table: TableName, query: StoreQuery = {}): StoreRow[] | undefined {
		const name = `${space}_${table}`;
		const { sql, params } = buildSelect(name, query);

		const handle = this.locate(space, table);
		if (!handle || !this.hasTable(handle, name)) {
			this.logger.debug('Store table absent', { table: name });
			return undefined;
		}

		// Engine faults (Database.SqliteError) reach the caller as thrown.
		const rows: unknown[] = this.prepare(handle, sql).all(...params);
		return rows.filter(isRow);
	}

	/**
	 * Releases every open database handle
	 */
	close(): void {
		this.statements.clear();
		this.presence.clear();
		this.release();
	}

	private hasTable(handle: Handle, name: string): boolean {
		const known = this.presence.get(name);
		if (known !== undefined) {
			return known;
		}
		const found =
			this.prepare(handle, "SELECT 1 FROM sqlite_master WHERE type IN ('table', 'view') AND name = ?").get(name) !==
			undefined;
		this.presence.set(name, found);
		return found;
	}

	private prepare(handle: Handle, sql: string): Database.Statement {
		// The same SQL can target different files in the distributed layout
		const handleKey = `${handle.name}\u0000${sql}`;
		let statement = this.statements.get(handleKey);
		if (!statement) {
			statement = handle.prepare(sql);
			this.statements.set(handleKey, statement);
		}
		return statement;
	}
}

/**
 * Builds a parameterised SELECT; column names are checked, values are bound
 */
export function buildSelect(table: string, query: StoreQuery): { sql: string; params: string[] } {
	const columns = query.columns?.length ? query.columns.map(quoteIdentifier).join(', ') : '*';
	const params: string[] = [];
	const clauses = Object.entries(query.where ?? {}).map(([column, match]) =>
		predicate(quoteIdentifier(column), match, params),
	);

	const where = clauses.length ? ` WHERE ${clauses.join(' AND ')}` : '';
	return { sql: `SELECT ${columns} FROM ${quoteIdentifier(table)}${where}`, params };
}

function predicate(column: string, match: ColumnMatch, params: string[]): string {
	if (typeof match === 'string') {
		params.push(match);
		return `${column} = ?`;
	}
	if ('like' in match) {
		params.push(match.like);
		return `${column} LIKE ? ESCAPE '\\'`;
	}
	if (match.in.length === 0) {
		return '0';
	}
	params.push(...match.in);
	return `${column} IN (${match.in.map(() => '?').join(', ')})`;
}

function quoteIdentifier(name: string): string {
	if (!IDENTIFIER.test(name)) {
		throw new StoreError(`invalid identifier '${name}'`);
	}
	return `"${name}"`;
}

function isRow(row: unknown): row is StoreRow {
	return typeof row === 'object' && row !== null;
}
