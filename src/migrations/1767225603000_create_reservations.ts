import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('reservations', {
    id: { type: 'uuid', primaryKey: true },
    tenant_id: { type: 'text', notNull: true },
    reservation_type: { type: 'text', notNull: true },
    priority: { type: 'text', notNull: true, default: 'NORMAL' },
    strategy: { type: 'text', notNull: true, default: 'FIFO' },
    status: { type: 'text', notNull: true, default: 'PENDING' },
    warehouse_id: { type: 'text' },
    source_document_type: { type: 'text' },
    source_document_id: { type: 'text' },
    required_at: { type: 'timestamptz', notNull: true },
    expires_at: { type: 'timestamptz', notNull: true },
    auto_release_on_expiry: { type: 'boolean', notNull: true, default: true },
    auto_allocate: { type: 'boolean', notNull: true, default: false },
    partial_fulfillment_allowed: { type: 'boolean', notNull: true, default: true },
    send_expiry_notifications: { type: 'boolean', notNull: true, default: true },
    notification_lead_time_hours: { type: 'integer', notNull: true, default: 24 },
    last_notification_sent_at: { type: 'timestamptz' },
    escalation_required: { type: 'boolean', notNull: true, default: false },
    escalated_to: { type: 'text' },
    escalation_reason: { type: 'text' },
    escalated_at: { type: 'timestamptz' },
    reserved_value: { type: 'numeric(20,2)', notNull: true, default: 0 },
    fulfilled_value: { type: 'numeric(20,2)', notNull: true, default: 0 },
    cancellation_reason: { type: 'text' },
    cancelled_at: { type: 'timestamptz' },
    expired_at: { type: 'timestamptz' },
    fulfilled_at: { type: 'timestamptz' },
    notes: { type: 'text' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('reservations', 'chk_reservations_expiry_after_required', 'CHECK (expires_at > required_at)');
  pgm.createIndex('reservations', ['tenant_id', 'status', 'expires_at'], {
    name: 'idx_reservations_status_expiry'
  });

  pgm.createTable('reservation_items', {
    id: { type: 'uuid', primaryKey: true },
    tenant_id: { type: 'text', notNull: true },
    reservation_id: { type: 'uuid', notNull: true, references: 'reservations', onDelete: 'CASCADE' },
    line_number: { type: 'integer', notNull: true },
    product_id: { type: 'text', notNull: true },
    variant_id: { type: 'text' },
    quantity_requested: { type: 'numeric(18,3)', notNull: true },
    quantity_reserved: { type: 'numeric(18,3)', notNull: true, default: 0 },
    quantity_allocated: { type: 'numeric(18,3)', notNull: true, default: 0 },
    quantity_picked: { type: 'numeric(18,3)', notNull: true, default: 0 },
    quantity_fulfilled: { type: 'numeric(18,3)', notNull: true, default: 0 },
    quantity_backordered: { type: 'numeric(18,3)', notNull: true, default: 0 },
    preferred_warehouse_id: { type: 'text' },
    preferred_location_id: { type: 'text' },
    preferred_batch_id: { type: 'text' },
    quality_grade_required: { type: 'text' },
    min_shelf_life_days: { type: 'integer' },
    manual_position_ids: { type: 'uuid[]', notNull: true, default: pgm.func("'{}'::uuid[]") },
    status: { type: 'text', notNull: true, default: 'PENDING' },
    reserved_value: { type: 'numeric(20,2)', notNull: true, default: 0 },
    fulfilled_value: { type: 'numeric(20,2)', notNull: true, default: 0 },
    allocated_at: { type: 'timestamptz' },
    fulfilled_at: { type: 'timestamptz' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint(
    'reservation_items',
    'uq_reservation_items_line',
    'UNIQUE (reservation_id, line_number)'
  );
  pgm.addConstraint('reservation_items', 'chk_reservation_items_qty_positive', 'CHECK (quantity_requested > 0)');

  pgm.createTable('reservation_allocations', {
    id: { type: 'uuid', primaryKey: true },
    tenant_id: { type: 'text', notNull: true },
    reservation_id: { type: 'uuid', notNull: true, references: 'reservations', onDelete: 'CASCADE' },
    reservation_item_id: { type: 'uuid', notNull: true, references: 'reservation_items', onDelete: 'CASCADE' },
    position_id: { type: 'uuid', notNull: true, references: 'stock_positions' },
    quantity_allocated: { type: 'numeric(18,3)', notNull: true },
    quantity_held_reserved: { type: 'numeric(18,3)', notNull: true, default: 0 },
    quantity_held_allocated: { type: 'numeric(18,3)', notNull: true, default: 0 },
    quantity_held_picked: { type: 'numeric(18,3)', notNull: true, default: 0 },
    quantity_fulfilled: { type: 'numeric(18,3)', notNull: true, default: 0 },
    quantity_released: { type: 'numeric(18,3)', notNull: true, default: 0 },
    quantity_remaining: { type: 'numeric(18,3)', notNull: true },
    unit_cost: { type: 'numeric(18,4)', notNull: true, default: 0 },
    fulfilled_cost: { type: 'numeric(20,2)', notNull: true, default: 0 },
    status: { type: 'text', notNull: true, default: 'ACTIVE' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.createIndex('reservation_allocations', ['tenant_id', 'reservation_item_id'], {
    name: 'idx_reservation_allocations_item'
  });
  pgm.createIndex('reservation_allocations', ['tenant_id', 'position_id'], {
    name: 'idx_reservation_allocations_position',
    where: "status = 'ACTIVE'"
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('reservation_allocations');
  pgm.dropTable('reservation_items');
  pgm.dropTable('reservations');
}
