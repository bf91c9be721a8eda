import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('stock_movements', {
    id: { type: 'uuid', primaryKey: true },
    tenant_id: { type: 'text', notNull: true },
    position_id: { type: 'uuid', notNull: true, references: 'stock_positions' },
    sequence: { type: 'bigint', notNull: true },
    movement_type: { type: 'text', notNull: true },
    status: { type: 'text', notNull: true, default: 'CONFIRMED' },
    quantity: { type: 'numeric(18,3)', notNull: true },
    unit_cost: { type: 'numeric(18,4)', notNull: true, default: 0 },
    total_cost: { type: 'numeric(20,2)', notNull: true, default: 0 },
    on_hand_before: { type: 'numeric(18,3)', notNull: true },
    on_hand_after: { type: 'numeric(18,3)', notNull: true },
    reference_id: { type: 'text' },
    document_type: { type: 'text' },
    document_id: { type: 'text' },
    reason: { type: 'text' },
    is_reversal: { type: 'boolean', notNull: true, default: false },
    reversed_movement_id: {
      type: 'uuid',
      references: 'stock_movements',
      deferrable: true,
      deferred: true
    },
    occurred_at: { type: 'timestamptz', notNull: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint(
    'stock_movements',
    'uq_stock_movements_position_sequence',
    'UNIQUE (tenant_id, position_id, sequence)'
  );
  pgm.addConstraint(
    'stock_movements',
    'chk_stock_movements_status',
    "CHECK (status IN ('CONFIRMED', 'CANCELLED', 'REVERSED'))"
  );
  pgm.createIndex('stock_movements', ['tenant_id', 'position_id', 'movement_type', 'reference_id'], {
    name: 'uq_stock_movements_reference',
    unique: true,
    where: 'reference_id IS NOT NULL'
  });
  pgm.createIndex('stock_movements', ['tenant_id', 'document_type', 'document_id'], {
    name: 'idx_stock_movements_document',
    where: 'document_id IS NOT NULL'
  });
  pgm.createIndex('stock_movements', ['tenant_id', 'position_id', 'occurred_at'], {
    name: 'idx_stock_movements_position_occurred'
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('stock_movements');
}
