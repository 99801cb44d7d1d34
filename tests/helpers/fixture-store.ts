import Database from "better-sqlite3";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { Language } from "../../src/domain/constants/languages";
import { WordNet } from "../../src/domain/wordnet";
import type { ILogger } from "../../src/infrastructure/logging/logger";
import { SqliteStoreAccessor } from "../../src/infrastructure/store/sqlite-store.accessor";

const FIXTURE_SQL = fileURLToPath(new URL("../fixtures/wordnet.sql", import.meta.url));

export function openFixtureDatabase(): Database.Database {
  const db = new Database(":memory:");
  db.exec(readFileSync(FIXTURE_SQL, "utf8"));
  return db;
}

export function createFixtureStore(logger?: ILogger): SqliteStoreAccessor {
  return SqliteStoreAccessor.fromDatabase(openFixtureDatabase(), logger);
}

export function createFixtureWordNet(language: Language, logger?: ILogger): WordNet {
  return new WordNet(language, { store: createFixtureStore(logger), logger });
}

/** Logger that records every call for assertions. */
export class RecordingLogger implements ILogger {
  readonly entries: { level: string; message: string; context?: Record<string, unknown> }[] = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: "debug", message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: "info", message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: "warn", message, context });
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: "error", message, context });
  }

  messages(level: string): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}
