import { v4 as uuidv4 } from 'uuid';
import type { PoolClient } from 'pg';
import type { OutboxEventInput } from '../domains/inventory/types';

/**
 * Writes an event in the caller's transaction. A repeated
 * (tenant, aggregate type, aggregate id, event type) is dropped.
 */
export async function enqueueOutboxEvent(client: PoolClient, input: OutboxEventInput): Promise<string> {
  const id = uuidv4();
  const payload = input.payload ?? {};

  await client.query(
    `INSERT INTO outbox_events (
        id, tenant_id, aggregate_type, aggregate_id, event_type, payload, status, attempts,
        available_at, created_at, updated_at
     ) VALUES ($1, $2, $3, $4, $5, $6, 'pending', 0, now(), now(), now())
     ON CONFLICT (tenant_id, aggregate_type, aggregate_id, event_type) DO NOTHING`,
    [id, input.tenantId, input.aggregateType, input.aggregateId, input.eventType, JSON.stringify(payload)]
  );

  return id;
}
