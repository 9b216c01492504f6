/**
 * SQLite implementation of ClientRepository
 */

import type Database from 'better-sqlite3';
import { ClientRepository } from '../interfaces/ClientRepository.js';
import { ClientWebhookSettings } from '../../types/payment.js';

interface ClientRow {
  id: string;
  webhook_enabled: number;
  webhook_url: string | null;
  webhook_secret: string | null;
  created_at: string;
  updated_at: string;
}

function toDomainClient(row: ClientRow): ClientWebhookSettings {
  return {
    clientId: row.id,
    webhookEnabled: row.webhook_enabled === 1,
    webhookUrl: row.webhook_url,
    webhookSecret: row.webhook_secret,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export class SqliteClientRepository implements ClientRepository {
  constructor(private db: Database.Database) {}

  async findById(clientId: string): Promise<ClientWebhookSettings | null> {
    const row = this.db.prepare<[string], ClientRow>('SELECT * FROM clients WHERE id = ?').get(clientId);
    return row ? toDomainClient(row) : null;
  }

  async upsert(
    clientId: string,
    data: Partial<Pick<ClientWebhookSettings, 'webhookEnabled' | 'webhookUrl' | 'webhookSecret'>>
  ): Promise<ClientWebhookSettings> {
    const existing = await this.findById(clientId);
    const now = new Date().toISOString();

    const next = {
      id: clientId,
      webhookEnabled: (data.webhookEnabled ?? existing?.webhookEnabled ?? false) ? 1 : 0,
      webhookUrl: data.webhookUrl !== undefined ? data.webhookUrl : (existing?.webhookUrl ?? null),
      webhookSecret:
        data.webhookSecret !== undefined ? data.webhookSecret : (existing?.webhookSecret ?? null),
      now,
    };

    this.db
      .prepare<typeof next>(
        `INSERT INTO clients (id, webhook_enabled, webhook_url, webhook_secret, created_at, updated_at)
         VALUES (@id, @webhookEnabled, @webhookUrl, @webhookSecret, @now, @now)
         ON CONFLICT(id) DO UPDATE SET
           webhook_enabled = excluded.webhook_enabled,
           webhook_url = excluded.webhook_url,
           webhook_secret = excluded.webhook_secret,
           updated_at = excluded.updated_at`
      )
      .run(next);

    const saved = await this.findById(clientId);
    if (!saved) {
      throw new Error(`Client ${clientId} was not saved`);
    }
    return saved;
  }
}
