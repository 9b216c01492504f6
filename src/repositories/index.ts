/**
 * Repository Layer
 *
 * Services depend on the repository interfaces; SQLite backs them in
 * production and in-memory fakes back them in tests.
 */

// Interfaces
export * from './interfaces/index.js';

// SQLite implementations
export * from './sqlite/index.js';

// Factory functions for creating repositories
import type Database from 'better-sqlite3';
import { getDatabase } from '../config/database.js';
import { ClientRepository } from './interfaces/ClientRepository.js';
import { WebhookEventRepository } from './interfaces/WebhookEventRepository.js';
import { SqliteClientRepository } from './sqlite/SqliteClientRepository.js';
import { SqliteWebhookEventRepository } from './sqlite/SqliteWebhookEventRepository.js';

let clientRepository: ClientRepository | null = null;
let webhookEventRepository: WebhookEventRepository | null = null;

/**
 * Get the client repository singleton
 */
export function getClientRepository(db?: Database.Database): ClientRepository {
  if (!clientRepository) {
    clientRepository = new SqliteClientRepository(db ?? getDatabase());
  }
  return clientRepository;
}

/**
 * Get the webhook event repository singleton
 */
export function getWebhookEventRepository(db?: Database.Database): WebhookEventRepository {
  if (!webhookEventRepository) {
    webhookEventRepository = new SqliteWebhookEventRepository(db ?? getDatabase());
  }
  return webhookEventRepository;
}

/**
 * Set custom repository implementations (for testing)
 */
export function setClientRepository(repo: ClientRepository): void {
  clientRepository = repo;
}

export function setWebhookEventRepository(repo: WebhookEventRepository): void {
  webhookEventRepository = repo;
}

/**
 * Clear repository singletons (for testing)
 */
export function clearRepositories(): void {
  clientRepository = null;
  webhookEventRepository = null;
}
