/**
 * Repository Interfaces
 */

export type { ClientRepository } from './ClientRepository.js';
export type { WebhookEventRepository, NewWebhookEvent } from './WebhookEventRepository.js';
