import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('customer_mappings', {
    id: 'id',
    store_id: { type: 'integer', notNull: true, unique: true, references: 'stores', onDelete: 'CASCADE' },
    customer_id: { type: 'integer', notNull: true },
    business_name: { type: 'text' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.createTable('quotation_defaults', {
    id: 'id',
    store_id: { type: 'integer', notNull: true, unique: true, references: 'stores', onDelete: 'CASCADE' },
    // NULL leaves the column off written quotations.
    status: { type: 'integer', default: 1 },
    shipper_id: { type: 'integer' },
    sales_rep_id: { type: 'integer' },
    term_id: { type: 'integer' },
    title_prefix: { type: 'text', default: 'Shopify Order' },
    expiration_days: { type: 'integer', notNull: true, default: 365 },
    db_id: { type: 'char(1)', notNull: true, default: '1' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('quotation_defaults', 'chk_quotation_defaults_db_id', {
    check: "db_id ~ '^[0-9]$'"
  });
  pgm.addConstraint('quotation_defaults', 'chk_quotation_defaults_expiration_days', {
    check: 'expiration_days >= 0'
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('quotation_defaults');
  pgm.dropTable('customer_mappings');
}
