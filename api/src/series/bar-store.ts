import { Logger, OnModuleDestroy } from '@nestjs/common';
import Database from 'better-sqlite3';
import { Bar } from '../common/models/bar.model';

interface BarRow {
  instrument_id: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  fetched_at: string;
}

function toBar(row: BarRow): Bar {
  return {
    instrumentId: row.instrument_id,
    date: row.date,
    open: row.open,
    high: row.high,
    low: row.low,
    close: row.close,
    volume: row.volume,
    fetchedAt: row.fetched_at,
  };
}

export type UpsertOutcome = 'inserted' | 'revised' | 'unchanged';

export interface UpsertResult {
  bar: Bar;
  outcome: UpsertOutcome;
  previous?: Bar;
}

function sameValues(a: Bar, b: Bar): boolean {
  return (
    a.open === b.open &&
    a.high === b.high &&
    a.low === b.low &&
    a.close === b.close &&
    a.volume === b.volume
  );
}

/**
 * Append-mostly SQLite table of daily bars keyed by (instrument_id, date).
 * Pass ':memory:' for a throwaway in-process database.
 */
export class SqliteBarStore implements OnModuleDestroy {
  private readonly logger = new Logger(SqliteBarStore.name);
  private readonly db: Database.Database;

  private readonly selectUpTo: Database.Statement<[string, string], BarRow>;
  private readonly selectRange: Database.Statement<[string, string, string], BarRow>;
  private readonly selectOne: Database.Statement<[string, string], BarRow>;
  private readonly selectLatest: Database.Statement<[string], BarRow>;
  private readonly insertBar: Database.Statement<[BarRow]>;
  private readonly updateBar: Database.Statement<[BarRow]>;
  private readonly pruneOld: Database.Statement<[string, string, number]>;

  constructor(file: string) {
    this.db = new Database(file);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS bars (
        instrument_id TEXT NOT NULL,
        date          TEXT NOT NULL,
        open          REAL NOT NULL,
        high          REAL NOT NULL,
        low           REAL NOT NULL,
        close         REAL NOT NULL,
        volume        REAL NOT NULL,
        fetched_at    TEXT NOT NULL,
        PRIMARY KEY (instrument_id, date)
      )
    `);

    this.selectUpTo = this.db.prepare<[string, string], BarRow>(
      'SELECT * FROM bars WHERE instrument_id = ? AND date <= ? ORDER BY date ASC',
    );
    this.selectRange = this.db.prepare<[string, string, string], BarRow>(
      'SELECT * FROM bars WHERE instrument_id = ? AND date >= ? AND date < ? ORDER BY date ASC',
    );
    this.selectOne = this.db.prepare<[string, string], BarRow>(
      'SELECT * FROM bars WHERE instrument_id = ? AND date = ?',
    );
    this.selectLatest = this.db.prepare<[string], BarRow>(
      'SELECT * FROM bars WHERE instrument_id = ? ORDER BY date DESC LIMIT 1',
    );
    this.insertBar = this.db.prepare<[BarRow]>(`
      INSERT INTO bars (instrument_id, date, open, high, low, close, volume, fetched_at)
      VALUES (@instrument_id, @date, @open, @high, @low, @close, @volume, @fetched_at)
    `);
    this.updateBar = this.db.prepare<[BarRow]>(`
      UPDATE bars SET open = @open, high = @high, low = @low, close = @close,
        volume = @volume, fetched_at = @fetched_at
      WHERE instrument_id = @instrument_id AND date = @date
    `);
    // keep the newest N rows: delete everything older than the N-th newest date
    this.pruneOld = this.db.prepare<[string, string, number]>(`
      DELETE FROM bars WHERE instrument_id = ? AND date < (
        SELECT date FROM bars WHERE instrument_id = ? ORDER BY date DESC LIMIT 1 OFFSET ?
      )
    `);
  }

  /** All bars dated on or before `asOf`, ascending. */
  upTo(instrumentId: string, asOf: string): Bar[] {
    return this.selectUpTo.all(instrumentId, asOf).map(toBar);
  }

  /** Bars in [from, to), ascending. */
  range(instrumentId: string, from: string, to: string): Bar[] {
    return this.selectRange.all(instrumentId, from, to).map(toBar);
  }

  latest(instrumentId: string): Bar | null {
    const row = this.selectLatest.get(instrumentId);
    return row ? toBar(row) : null;
  }

  /**
   * Inserts new bars and overwrites differing ones in a single transaction.
   * A bar equal in OHLCV to the stored one is left as it is.
   */
  upsert(bars: Bar[]): UpsertResult[] {
    const run = this.db.transaction((batch: Bar[]): UpsertResult[] =>
      batch.map((bar) => {
        const row: BarRow = {
          instrument_id: bar.instrumentId,
          date: bar.date,
          open: bar.open,
          high: bar.high,
          low: bar.low,
          close: bar.close,
          volume: bar.volume,
          fetched_at: bar.fetchedAt,
        };
        const existing = this.selectOne.get(bar.instrumentId, bar.date);
        if (!existing) {
          this.insertBar.run(row);
          return { bar, outcome: 'inserted' };
        }
        const previous = toBar(existing);
        if (sameValues(previous, bar)) return { bar: previous, outcome: 'unchanged' };
        this.updateBar.run(row);
        return { bar, outcome: 'revised', previous };
      }),
    );
    return run(bars);
  }

  /** Deletes all but the newest `keep` bars of an instrument; returns rows removed. */
  retainNewest(instrumentId: string, keep: number): number {
    if (keep <= 0) return 0;
    return this.pruneOld.run(instrumentId, instrumentId, keep - 1).changes;
  }

  onModuleDestroy(): void {
    if (this.db.open) {
      this.db.close();
      this.logger.log('Bar store closed');
    }
  }
}
