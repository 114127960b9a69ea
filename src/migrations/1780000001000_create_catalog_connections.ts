import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('catalog_connections', {
    id: 'id',
    role: { type: 'text', notNull: true, unique: true },
    host: { type: 'text', notNull: true },
    port: { type: 'integer', notNull: true, default: 5432 },
    database_name: { type: 'text', notNull: true },
    username: { type: 'text', notNull: true },
    password_encrypted: { type: 'text', notNull: true, default: '' },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    updated_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') }
  });

  pgm.addConstraint('catalog_connections', 'chk_catalog_connections_role', {
    check: "role IN ('primary', 'secondary')"
  });
  pgm.addConstraint('catalog_connections', 'chk_catalog_connections_port', {
    check: 'port BETWEEN 1 AND 65535'
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('catalog_connections');
}
