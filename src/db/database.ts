import Database from 'better-sqlite3';
import { getDatabasePath } from '../config';
import { Draft, DraftStats, DraftStatus, GenerationSource, NewDraft } from '../types';

let db: Database.Database | null = null;

interface DraftRow {
    id: number;
    prompt: string;
    content: string;
    subject: string | null;
    recipient: string;
    tone: string;
    email_type: string;
    source: GenerationSource;
    status: DraftStatus;
    error: string | null;
    created_at: string;
    sent_at: string | null;
}

export function initDatabase(filePath?: string): Database.Database {
    if (db) return db;

    db = new Database(filePath ?? getDatabasePath());

    // Create tables if not exist
    db.exec(`
    CREATE TABLE IF NOT EXISTS drafts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      prompt TEXT NOT NULL,
      content TEXT NOT NULL,
      subject TEXT,
      recipient TEXT NOT NULL,
      tone TEXT NOT NULL DEFAULT 'professional',
      email_type TEXT NOT NULL DEFAULT 'general',
      source TEXT NOT NULL DEFAULT 'api',
      status TEXT NOT NULL DEFAULT 'draft',
      error TEXT,
      created_at DATETIME NOT NULL,
      sent_at DATETIME
    );

    CREATE INDEX IF NOT EXISTS idx_drafts_status ON drafts(status);
    CREATE INDEX IF NOT EXISTS idx_drafts_created_at ON drafts(created_at);
  `);

    return db;
}

export function getDatabase(): Database.Database {
    if (!db) {
        return initDatabase();
    }
    return db;
}

export function closeDatabase(): void {
    if (db) {
        db.close();
        db = null;
    }
}

function toDraft(row: DraftRow): Draft {
    return {
        id: row.id,
        prompt: row.prompt,
        content: row.content,
        subject: row.subject,
        recipient: row.recipient,
        tone: row.tone,
        emailType: row.email_type,
        source: row.source,
        status: row.status,
        error: row.error,
        createdAt: new Date(row.created_at),
        sentAt: row.sent_at ? new Date(row.sent_at) : null,
    };
}

// Draft operations
export function createDraft(draft: NewDraft, createdAt: Date = new Date()): Draft {
    const db = getDatabase();
    const stmt = db.prepare(`
    INSERT INTO drafts (prompt, content, subject, recipient, tone, email_type, source, status, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, 'draft', ?)
  `);
    const info = stmt.run(
        draft.prompt,
        draft.content,
        draft.subject ?? null,
        draft.recipient,
        draft.tone,
        draft.emailType,
        draft.source,
        createdAt.toISOString(),
    );

    const created = getDraft(Number(info.lastInsertRowid));
    if (!created) {
        throw new Error(`Draft ${info.lastInsertRowid} disappeared after insert`);
    }
    return created;
}

export function getDraft(id: number): Draft | null {
    const db = getDatabase();
    const row = db.prepare('SELECT * FROM drafts WHERE id = ?').get(id) as DraftRow | undefined;
    return row ? toDraft(row) : null;
}

export function listDrafts(limit: number = 100): Draft[] {
    const db = getDatabase();
    const rows = db.prepare('SELECT * FROM drafts ORDER BY created_at DESC, id DESC LIMIT ?').all(limit) as DraftRow[];
    return rows.map(toDraft);
}

export function updateDraftContent(id: number, content: string, subject?: string): boolean {
    const db = getDatabase();
    const stmt = db.prepare(`
    UPDATE drafts
    SET content = ?, subject = COALESCE(?, subject)
    WHERE id = ?
  `);
    return stmt.run(content, subject ?? null, id).changes > 0;
}

export function markDraftSent(id: number, sentAt: Date = new Date()): void {
    const db = getDatabase();
    db.prepare("UPDATE drafts SET status = 'sent', error = NULL, sent_at = ? WHERE id = ?").run(sentAt.toISOString(), id);
}

export function markDraftFailed(id: number, error: string): void {
    const db = getDatabase();
    db.prepare("UPDATE drafts SET status = 'failed', error = ? WHERE id = ?").run(error, id);
}

export function deleteDraft(id: number): boolean {
    const db = getDatabase();
    return db.prepare('DELETE FROM drafts WHERE id = ?').run(id).changes > 0;
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export function getDraftStats(now: Date = new Date()): DraftStats {
    const db = getDatabase();

    const counts = db
        .prepare(
            `
    SELECT
      COUNT(*) as total,
      COALESCE(SUM(CASE WHEN status = 'sent' THEN 1 ELSE 0 END), 0) as sent,
      COALESCE(SUM(CASE WHEN status = 'draft' THEN 1 ELSE 0 END), 0) as drafts,
      COALESCE(SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END), 0) as failed
    FROM drafts
  `,
        )
        .get() as { total: number; sent: number; drafts: number; failed: number };

    const weekAgo = new Date(now.getTime() - 7 * 24 * 60 * 60 * 1000);
    const recent = db.prepare('SELECT COUNT(*) as count FROM drafts WHERE created_at >= ?').get(weekAgo.toISOString()) as {
        count: number;
    };

    const popularTones = db
        .prepare('SELECT tone, COUNT(*) as count FROM drafts GROUP BY tone ORDER BY count DESC, tone ASC')
        .all() as { tone: string; count: number }[];

    // Last six calendar months (UTC), oldest first
    const monthly = db
        .prepare(
            `
    SELECT
      substr(created_at, 1, 7) as month,
      SUM(CASE WHEN status = 'sent' THEN 1 ELSE 0 END) as sent,
      SUM(CASE WHEN status = 'draft' THEN 1 ELSE 0 END) as drafts
    FROM drafts
    GROUP BY month
  `,
        )
        .all() as { month: string; sent: number; drafts: number }[];
    const byMonth = new Map(monthly.map((row) => [row.month, row]));

    const monthlyStats: DraftStats['monthlyStats'] = [];
    for (let i = 5; i >= 0; i--) {
        const monthStart = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - i, 1));
        const key = monthStart.toISOString().slice(0, 7);
        const row = byMonth.get(key);
        monthlyStats.push({
            month: MONTHS[monthStart.getUTCMonth()],
            sent: row?.sent ?? 0,
            drafts: row?.drafts ?? 0,
        });
    }

    return {
        totalDrafts: counts.drafts,
        totalSent: counts.sent,
        totalFailed: counts.failed,
        totalEmails: counts.total,
        successRate: counts.total > 0 ? Math.round((counts.sent / counts.total) * 1000) / 10 : 0,
        recentActivity: recent.count,
        popularTones,
        monthlyStats,
        generatedAt: now,
    };
}
