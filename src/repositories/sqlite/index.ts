export { SqliteClientRepository } from './SqliteClientRepository.js';
export { SqliteWebhookEventRepository } from './SqliteWebhookEventRepository.js';
