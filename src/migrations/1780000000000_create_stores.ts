import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('stores', {
    id: 'id',
    name: { type: 'text', notNull: true, unique: true },
    shop_url: { type: 'text', notNull: true },
    // AES-GCM envelope written by lib/secrets.
    admin_api_token: { type: 'text', notNull: true },
    is_active: { type: 'boolean', notNull: true, default: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('stores');
}
