import type { MigrationBuilder } from 'node-pg-migrate';

const TRANSFER_STATUS = "('success','failed','pending')";

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('transfer_history', {
    id: { type: 'bigserial', primaryKey: true },
    store_id: { type: 'integer', notNull: true, references: 'stores', onDelete: 'CASCADE' },
    order_id: { type: 'text', notNull: true },
    order_name: { type: 'text' },
    quotation_number: { type: 'text' },
    status: { type: 'text', notNull: true },
    error_message: { type: 'text' },
    line_items_count: { type: 'integer', notNull: true, default: 0 },
    total_amount: { type: 'numeric(12,2)', notNull: true, default: 0 },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('transfer_history', 'chk_transfer_history_status', {
    check: `status IN ${TRANSFER_STATUS}`
  });

  // At most one success per order and store. Failed attempts may repeat.
  pgm.createIndex('transfer_history', ['order_id', 'store_id'], {
    name: 'transfer_history_one_success_idx',
    unique: true,
    where: "status = 'success'"
  });
  pgm.createIndex('transfer_history', ['store_id', 'created_at'], { name: 'idx_transfer_history_store_created' });
  pgm.createIndex('transfer_history', ['status'], { name: 'idx_transfer_history_status' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('transfer_history');
}
