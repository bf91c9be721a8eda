import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('outbox_events', {
    id: { type: 'uuid', primaryKey: true },
    tenant_id: { type: 'text', notNull: true },
    aggregate_type: { type: 'text', notNull: true },
    aggregate_id: { type: 'text', notNull: true },
    event_type: { type: 'text', notNull: true },
    payload: { type: 'jsonb', notNull: true },
    status: { type: 'text', notNull: true, default: 'pending' },
    attempts: { type: 'integer', notNull: true, default: 0 },
    available_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint(
    'outbox_events',
    'uq_outbox_events_aggregate_event',
    'UNIQUE (tenant_id, aggregate_type, aggregate_id, event_type)'
  );
  pgm.createIndex('outbox_events', ['status', 'available_at'], {
    name: 'idx_outbox_events_pending',
    where: "status = 'pending'"
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('outbox_events');
}
