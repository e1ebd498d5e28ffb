import Database from "better-sqlite3";
import { z } from "zod";
import { openDb } from "../../db/connection.js";
import { createLogger } from "../../log.js";
import type { PlayerRecord, PlayerStore } from "../../games/blackjack/session.js";

const log = createLogger("store");

const colSchema = z.array(z.object({ name: z.string() }).passthrough());
function cols(db: Database.Database, table: string): Set<string> {
    return new Set(colSchema.parse(db.prepare(`PRAGMA table_info(${table})`).all()).map(c => c.name));
}

export function ensurePlayersSchema(db: Database.Database) {
    const hasTable = !!db.prepare(`SELECT 1 FROM sqlite_master WHERE type='table' AND name='players'`).get();
    if (!hasTable) {
        db.exec(`
      CREATE TABLE players(
        name TEXT PRIMARY KEY,
        chips INTEGER NOT NULL,
        wins INTEGER NOT NULL DEFAULT 0,
        losses INTEGER NOT NULL DEFAULT 0,
        ties INTEGER NOT NULL DEFAULT 0,
        updated_at INTEGER NOT NULL
      );
    `);
        log.info({ msg: "players_schema_created" });
        return;
    }
    // Older files kept a single combined tally; add the split counters.
    const names = cols(db, "players");
    for (const c of ["wins", "losses", "ties"]) {
        if (!names.has(c)) {
            db.exec(`ALTER TABLE players ADD COLUMN ${c} INTEGER NOT NULL DEFAULT 0`);
            log.info({ msg: "players_schema_added_column", column: c });
        }
    }
}

const rowSchema = z.object({
    name: z.string(),
    chips: z.number().int().min(0),
    wins: z.number().int().min(0),
    losses: z.number().int().min(0),
    ties: z.number().int().min(0),
});

export class SqlitePlayerStore implements PlayerStore {
    constructor(private readonly db: Database.Database = openDb()) {
        ensurePlayersSchema(db);
    }

    load(name: string): PlayerRecord | undefined {
        const row = this.db.prepare(`
      SELECT name, chips, wins, losses, ties FROM players WHERE name = ?
    `).get(name);
        if (!row) return undefined;
        const parsed = rowSchema.safeParse(row);
        if (!parsed.success) {
            log.warn({ msg: "player_row_invalid", name, issues: parsed.error.issues.map(i => i.message) });
            return undefined;
        }
        const { chips, wins, losses, ties } = parsed.data;
        return { name, chips, results: { wins, losses, ties } };
    }

    save(record: PlayerRecord) {
        const now = Math.floor(Date.now() / 1000);
        this.db.prepare(`
      INSERT INTO players(name, chips, wins, losses, ties, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(name) DO UPDATE SET
        chips = excluded.chips,
        wins = excluded.wins,
        losses = excluded.losses,
        ties = excluded.ties,
        updated_at = excluded.updated_at
    `).run(record.name, record.chips, record.results.wins, record.results.losses, record.results.ties, now);
    }
}
