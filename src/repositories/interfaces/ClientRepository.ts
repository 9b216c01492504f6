/**
 * Client Repository Interface
 * Webhook settings of the clients that own payments
 */

import { ClientWebhookSettings } from '../../types/payment.js';

export interface ClientRepository {
  /**
   * Find a client's webhook settings
   */
  findById(clientId: string): Promise<ClientWebhookSettings | null>;

  /**
   * Create or update a client's webhook settings
   */
  upsert(
    clientId: string,
    data: Partial<Pick<ClientWebhookSettings, 'webhookEnabled' | 'webhookUrl' | 'webhookSecret'>>
  ): Promise<ClientWebhookSettings>;
}
