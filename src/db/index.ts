import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { Decision, DecisionOutcome, EvidenceRecord, Market, PredictionLogEntry, SourceQuality } from '../types/index.js';
import { PersistenceError, describeError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';

const log = createLogger('db');

interface MarketRow {
  id: string;
  title: string;
  description: string | null;
  probability: number;
  liquidity: number;
  end_date: string | null;
  slug: string | null;
  category: string | null;
  volume_24h: number;
  created_at: string;
  updated_at: string;
}

interface ResearchRow {
  recent_developments: string;
  evidence_yes: string;
  evidence_no: string;
  official_signals: string;
  timeline_constraints: string;
  source_quality: string;
}

interface DecisionRow {
  market_id: string;
  estimated_probability: number;
  confidence_level: number;
  edge: number;
  decision: string;
  key_risks: string;
  reasoning_summary: string;
  created_at: string;
}

interface PredictionRow {
  market_id: string;
  market_probability: number;
  estimated_probability: number;
  confidence_level: number;
  edge: number;
  decision: string;
  logged_at: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS markets (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    description TEXT,
    probability REAL NOT NULL,
    liquidity REAL NOT NULL,
    end_date TEXT,
    slug TEXT,
    category TEXT,
    volume_24h REAL DEFAULT 0.0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  -- market_id is not a foreign key: history rows are kept even when the market upsert failed
  CREATE TABLE IF NOT EXISTS research_reports (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    market_id TEXT NOT NULL,
    recent_developments TEXT NOT NULL,
    evidence_yes TEXT NOT NULL,
    evidence_no TEXT NOT NULL,
    official_signals TEXT NOT NULL,
    timeline_constraints TEXT NOT NULL,
    source_quality TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS decisions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    market_id TEXT NOT NULL,
    estimated_probability REAL NOT NULL,
    confidence_level REAL NOT NULL,
    edge REAL NOT NULL,
    decision TEXT NOT NULL,
    key_risks TEXT NOT NULL,
    reasoning_summary TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS predictions_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    market_id TEXT NOT NULL,
    market_probability REAL NOT NULL,
    estimated_probability REAL NOT NULL,
    confidence_level REAL NOT NULL,
    edge REAL NOT NULL,
    decision TEXT NOT NULL,
    logged_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_markets_category ON markets(category);
  CREATE INDEX IF NOT EXISTS idx_markets_end_date ON markets(end_date);
  CREATE INDEX IF NOT EXISTS idx_research_market_id ON research_reports(market_id);
  CREATE INDEX IF NOT EXISTS idx_decisions_market_id ON decisions(market_id);
  CREATE INDEX IF NOT EXISTS idx_decisions_created_at ON decisions(created_at);
  CREATE INDEX IF NOT EXISTS idx_predictions_market_id ON predictions_log(market_id);
`;

function toOutcome(value: string): DecisionOutcome {
  return value === 'yes' || value === 'no' ? value : 'pass';
}

function toQuality(value: string): SourceQuality {
  return value === 'high' || value === 'medium' || value === 'low' ? value : 'unknown';
}

function parseList(json: string): string[] {
  try {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
  } catch (err) {
    log.warn(`Unreadable list column: ${describeError(err)}`);
    return [];
  }
}

function rowToMarket(r: MarketRow): Market {
  return {
    id: r.id,
    title: r.title,
    description: r.description ?? '',
    probability: r.probability,
    liquidity: r.liquidity,
    volume24h: r.volume_24h,
    endDate: r.end_date ? new Date(r.end_date) : undefined,
    category: r.category ?? '',
    slug: r.slug ?? ''
  };
}

function rowToDecision(r: DecisionRow): Decision {
  return {
    marketId: r.market_id,
    estimatedProbability: r.estimated_probability,
    confidenceLevel: r.confidence_level,
    edge: r.edge,
    decision: toOutcome(r.decision),
    keyRisks: parseList(r.key_risks),
    reasoningSummary: r.reasoning_summary,
    createdAt: new Date(r.created_at)
  };
}

function rowToPrediction(r: PredictionRow): PredictionLogEntry {
  return {
    marketId: r.market_id,
    marketProbability: r.market_probability,
    estimatedProbability: r.estimated_probability,
    confidenceLevel: r.confidence_level,
    edge: r.edge,
    decision: toOutcome(r.decision),
    loggedAt: r.logged_at
  };
}

/**
 * SQLite persistence for markets, evidence, decisions and the predictions log.
 * Markets are upserted by id; everything else is append-only. Write failures
 * surface as PersistenceError.
 */
export class Storage {
  private readonly db: Database.Database;
  private readonly clock: () => Date;

  constructor(dbPath = ':memory:', clock: () => Date = () => new Date()) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.exec(SCHEMA);
    this.clock = clock;
    log.debug(`Database initialized at ${dbPath}`);
  }

  private write(what: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      throw new PersistenceError(`Error saving ${what}: ${describeError(err)}`, { cause: err });
    }
  }

  // Upsert; created_at survives later fetches of the same market
  saveMarket(market: Market): void {
    const now = this.clock().toISOString();
    this.write(`market ${market.id}`, () => {
      this.db.prepare(`
        INSERT INTO markets
        (id, title, description, probability, liquidity, end_date, slug, category, volume_24h, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          title = excluded.title,
          description = excluded.description,
          probability = excluded.probability,
          liquidity = excluded.liquidity,
          end_date = excluded.end_date,
          slug = excluded.slug,
          category = excluded.category,
          volume_24h = excluded.volume_24h,
          updated_at = excluded.updated_at
      `).run(
        market.id,
        market.title,
        market.description,
        market.probability,
        market.liquidity,
        market.endDate ? market.endDate.toISOString() : null,
        market.slug,
        market.category,
        market.volume24h,
        now,
        now
      );
    });
  }

  getMarket(id: string): Market | null {
    const row = this.db.prepare<[string], MarketRow>('SELECT * FROM markets WHERE id = ?').get(id);
    return row ? rowToMarket(row) : null;
  }

  getMarketTimestamps(id: string): { createdAt: string; updatedAt: string } | null {
    const row = this.db
      .prepare<[string], Pick<MarketRow, 'created_at' | 'updated_at'>>('SELECT created_at, updated_at FROM markets WHERE id = ?')
      .get(id);
    return row ? { createdAt: row.created_at, updatedAt: row.updated_at } : null;
  }

  listMarkets(limit = 100): Market[] {
    const rows = this.db.prepare<[number], MarketRow>('SELECT * FROM markets ORDER BY updated_at DESC LIMIT ?').all(limit);
    return rows.map(rowToMarket);
  }

  saveResearchReport(marketId: string, evidence: EvidenceRecord): void {
    this.write(`research report for ${marketId}`, () => {
      this.db.prepare(`
        INSERT INTO research_reports
        (market_id, recent_developments, evidence_yes, evidence_no, official_signals, timeline_constraints, source_quality, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        marketId,
        JSON.stringify(evidence.recentDevelopments),
        JSON.stringify(evidence.evidenceYes),
        JSON.stringify(evidence.evidenceNo),
        JSON.stringify(evidence.officialSignals),
        JSON.stringify(evidence.timelineConstraints),
        evidence.sourceQuality,
        this.clock().toISOString()
      );
    });
  }

  getLatestResearchReport(marketId: string): EvidenceRecord | null {
    const row = this.db
      .prepare<[string], ResearchRow>('SELECT * FROM research_reports WHERE market_id = ? ORDER BY id DESC LIMIT 1')
      .get(marketId);
    if (!row) return null;
    return {
      recentDevelopments: parseList(row.recent_developments),
      evidenceYes: parseList(row.evidence_yes),
      evidenceNo: parseList(row.evidence_no),
      officialSignals: parseList(row.official_signals),
      timelineConstraints: parseList(row.timeline_constraints),
      sourceQuality: toQuality(row.source_quality)
    };
  }

  saveDecision(decision: Decision): void {
    this.write(`decision for ${decision.marketId}`, () => {
      this.db.prepare(`
        INSERT INTO decisions
        (market_id, estimated_probability, confidence_level, edge, decision, key_risks, reasoning_summary, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        decision.marketId,
        decision.estimatedProbability,
        decision.confidenceLevel,
        decision.edge,
        decision.decision,
        JSON.stringify(decision.keyRisks),
        decision.reasoningSummary,
        decision.createdAt.toISOString()
      );
    });
  }

  getLatestDecision(marketId: string): Decision | null {
    const row = this.db
      .prepare<[string], DecisionRow>('SELECT * FROM decisions WHERE market_id = ? ORDER BY id DESC LIMIT 1')
      .get(marketId);
    return row ? rowToDecision(row) : null;
  }

  getDecisionsByEdge(minEdge: number, limit?: number): Decision[] {
    const sql = 'SELECT * FROM decisions WHERE ABS(edge) >= ? ORDER BY ABS(edge) DESC, id ASC';
    const rows = limit != null && limit > 0
      ? this.db.prepare<[number, number], DecisionRow>(`${sql} LIMIT ?`).all(minEdge, Math.floor(limit))
      : this.db.prepare<[number], DecisionRow>(sql).all(minEdge);
    return rows.map(rowToDecision);
  }

  logPrediction(entry: Omit<PredictionLogEntry, 'loggedAt'>): void {
    this.write(`prediction for ${entry.marketId}`, () => {
      this.db.prepare(`
        INSERT INTO predictions_log
        (market_id, market_probability, estimated_probability, confidence_level, edge, decision, logged_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        entry.marketId,
        entry.marketProbability,
        entry.estimatedProbability,
        entry.confidenceLevel,
        entry.edge,
        entry.decision,
        this.clock().toISOString()
      );
    });
  }

  // Newest first
  getPredictionHistory(marketId: string, limit?: number): PredictionLogEntry[] {
    const sql = 'SELECT * FROM predictions_log WHERE market_id = ? ORDER BY logged_at DESC, id DESC';
    const rows = limit != null && limit > 0
      ? this.db.prepare<[string, number], PredictionRow>(`${sql} LIMIT ?`).all(marketId, Math.floor(limit))
      : this.db.prepare<[string], PredictionRow>(sql).all(marketId);
    return rows.map(rowToPrediction);
  }

  close(): void {
    this.db.close();
  }
}
