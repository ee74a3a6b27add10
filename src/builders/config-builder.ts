import { createHash } from 'crypto';
import {
  POSTGRES_PORT,
  isTLSEnabled,
  names,
  type SearchDatabase,
  type SearchDatabaseUser,
} from '../apis/v1alpha1/search-database.js';

export const CONFIG_MOUNT_PATH = '/etc/postgresql/searchdb';
export const INIT_MOUNT_PATH = '/docker-entrypoint-initdb.d';
export const TLS_MOUNT_PATH = '/etc/postgresql/tls';
export const DATA_MOUNT_PATH = '/var/lib/postgresql/data';
export const WAL_MOUNT_PATH = '/var/lib/postgresql/wal';
export const PGDATA = `${DATA_MOUNT_PATH}/pgdata`;
export const POOLER_CONFIG_MOUNT_PATH = '/bitnami/pgbouncer/conf';
// Written by the pooler image from its POSTGRESQL_* environment
export const POOLER_AUTH_FILE = '/opt/bitnami/pgbouncer/conf/userlist.txt';
export const EXPORTER_QUERIES_MOUNT_PATH = '/etc/postgres-exporter';

export const POSTGRES_CONF_KEY = 'postgresql.conf';
export const PG_HBA_KEY = 'pg_hba.conf';
export const INIT_SCRIPT_KEY = 'init.sh';
export const POOLER_CONF_KEY = 'pgbouncer.ini';
export const EXPORTER_QUERIES_KEY = 'queries.yaml';

// Privileges GRANT accepts on a database
const DATABASE_PRIVILEGES: ReadonlySet<string> = new Set(['ALL', 'ALL PRIVILEGES', 'CONNECT', 'CREATE', 'TEMPORARY', 'TEMP']);

export function unsupportedPrivileges(user: SearchDatabaseUser): string[] {
  return user.privileges.filter((privilege) => !DATABASE_PRIVILEGES.has(privilege.toUpperCase()));
}

const PARAMETER_NAME = /^[A-Za-z_][A-Za-z0-9_.]*$/;
const CONTROL_CHARACTERS = /[\u0000-\u001f]/;

interface ExtensionInfo {
  name: string;
  preload: boolean;
}

function enabledExtensions(db: SearchDatabase): ExtensionInfo[] {
  const { extensions } = db.spec;
  const enabled: ExtensionInfo[] = [];
  if (extensions.pgSearch) enabled.push({ name: 'pg_search', preload: true });
  if (extensions.pgAnalytics) enabled.push({ name: 'pg_analytics', preload: true });
  if (extensions.pgVector) enabled.push({ name: 'vector', preload: false });
  for (const name of extensions.additional) {
    if (!enabled.some((e) => e.name === name)) {
      enabled.push({ name, preload: false });
    }
  }
  return enabled;
}

export function formatSettingValue(value: string): string {
  if (/^-?\d+$/.test(value)) return value;
  return `'${value.replace(/'/g, "''")}'`;
}

export function quoteIdent(identifier: string): string {
  if (CONTROL_CHARACTERS.test(identifier)) {
    throw new Error(`Identifier ${JSON.stringify(identifier)} contains control characters`);
  }
  return `"${identifier.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  if (CONTROL_CHARACTERS.test(value)) {
    throw new Error(`Literal ${JSON.stringify(value)} contains control characters`);
  }
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * postgresql.conf: operator defaults first, in a fixed order, then the
 * user's overrides. An override of a default replaces it in place; new keys
 * are appended sorted.
 */
export function buildPostgresConfig(db: SearchDatabase): string {
  const settings = new Map<string, string>();
  settings.set('listen_addresses', '*');
  settings.set('port', String(POSTGRES_PORT));
  settings.set('hba_file', `${CONFIG_MOUNT_PATH}/${PG_HBA_KEY}`);
  settings.set('password_encryption', 'scram-sha-256');

  const preload = enabledExtensions(db)
    .filter((e) => e.preload)
    .map((e) => e.name);
  if (preload.length > 0) {
    settings.set('shared_preload_libraries', preload.join(','));
  }

  if (isTLSEnabled(db)) {
    settings.set('ssl', 'on');
    settings.set('ssl_cert_file', `${TLS_MOUNT_PATH}/tls.crt`);
    settings.set('ssl_key_file', `${TLS_MOUNT_PATH}/tls.key`);
  }

  const overrides = Object.keys(db.spec.postgresConfig).sort();
  for (const key of overrides) {
    if (!PARAMETER_NAME.test(key)) {
      throw new Error(`Invalid configuration parameter name ${JSON.stringify(key)}`);
    }
    settings.set(key, db.spec.postgresConfig[key]);
  }

  const lines = ['# Managed by searchdb-operator; edits are overwritten.'];
  for (const [key, value] of settings) {
    lines.push(`${key} = ${formatSettingValue(value)}`);
  }
  return `${lines.join('\n')}\n`;
}

export function buildPgHbaConfig(db: SearchDatabase): string {
  const remote = isTLSEnabled(db) ? 'hostssl' : 'host';
  const lines = [
    '# TYPE  DATABASE  USER  ADDRESS  METHOD',
    'local all all trust',
    'host all all 127.0.0.1/32 scram-sha-256',
    'host all all ::1/128 scram-sha-256',
    ...db.spec.auth.pgHBA.map((rule) => rule.trim()).filter((rule) => rule.length > 0),
    `${remote} all all 0.0.0.0/0 scram-sha-256`,
    `${remote} all all ::/0 scram-sha-256`,
  ];
  return `${lines.join('\n')}\n`;
}

export function userPasswordEnv(index: number): string {
  return `SEARCHDB_USER_${index}_PASSWORD`;
}

const PSQL = 'psql -v ON_ERROR_STOP=1 --username "$POSTGRES_USER" --dbname "$POSTGRES_DB"';

/**
 * Shell script run by the image entrypoint on an empty data directory:
 * creates the enabled extensions, then each additional user with its
 * databases and grants. Passwords come from environment variables so they
 * never appear in the ConfigMap.
 */
export function buildInitScript(db: SearchDatabase): string {
  const { auth } = db.spec;
  const lines = ['#!/bin/bash', '# Managed by searchdb-operator. Runs once, on an empty data directory.'];

  const extensions = enabledExtensions(db);
  if (extensions.length > 0) {
    lines.push(`${PSQL} <<'EOSQL'`);
    for (const extension of extensions) {
      lines.push(`CREATE EXTENSION IF NOT EXISTS ${quoteIdent(extension.name)};`);
    }
    lines.push('EOSQL');
  }

  auth.users.forEach((user, index) => {
    const databases = user.databases.length > 0 ? user.databases : [auth.database];
    const privileges = user.privileges.length > 0 ? user.privileges.map((p) => p.toUpperCase()) : ['ALL PRIVILEGES'];

    lines.push(`${PSQL} -v role_password="$${userPasswordEnv(index)}" <<'EOSQL'`);
    lines.push(`CREATE ROLE ${quoteIdent(user.name)} LOGIN PASSWORD :'role_password';`);
    for (const database of databases) {
      if (database !== auth.database) {
        lines.push(
          `SELECT 'CREATE DATABASE ${quoteIdent(database).replace(/'/g, "''")}' ` +
            `WHERE NOT EXISTS (SELECT FROM pg_database WHERE datname = ${quoteLiteral(database)})\\gexec`,
        );
      }
      lines.push(`GRANT ${privileges.join(', ')} ON DATABASE ${quoteIdent(database)} TO ${quoteIdent(user.name)};`);
    }
    lines.push('EOSQL');
  });

  return `${lines.join('\n')}\n`;
}

export function buildPoolerConfig(db: SearchDatabase): string {
  const pooling = db.spec.connectionPooling;
  if (!pooling) {
    throw new Error('Connection pooling is not configured');
  }
  const database = db.spec.auth.database;

  return `[databases]
${database} = host=${names.service(db)} port=${POSTGRES_PORT} dbname=${database}

[pgbouncer]
listen_addr = 0.0.0.0
listen_port = ${POSTGRES_PORT}
auth_type = scram-sha-256
auth_file = ${POOLER_AUTH_FILE}
pool_mode = ${pooling.poolMode}
max_client_conn = ${pooling.maxClientConnections}
default_pool_size = ${pooling.defaultPoolSize}
min_pool_size = ${pooling.minPoolSize}
reserve_pool_size = ${pooling.reservePoolSize}
admin_users = postgres
stats_users = postgres
`;
}

/**
 * postgres_exporter extension queries. Each map entry is a metric namespace
 * whose value is the YAML body for it (`query`, `metrics`, ...); entries are
 * emitted sorted by namespace.
 */
export function buildExporterQueries(queries: Record<string, string>): string {
  const blocks = Object.keys(queries)
    .sort()
    .map((namespace) => {
      const body = queries[namespace]
        .split('\n')
        .filter((line) => line.trim().length > 0)
        .map((line) => `  ${line}`)
        .join('\n');
      return `${namespace}:\n${body}`;
    });
  return `${blocks.join('\n')}\n`;
}

export function buildDatabaseConfigData(db: SearchDatabase): Record<string, string> {
  return {
    [POSTGRES_CONF_KEY]: buildPostgresConfig(db),
    [PG_HBA_KEY]: buildPgHbaConfig(db),
    [INIT_SCRIPT_KEY]: buildInitScript(db),
  };
}

/** Short, stable digest of a ConfigMap data map. */
export function configHash(data: Record<string, string>): string {
  const hash = createHash('sha256');
  for (const key of Object.keys(data).sort()) {
    hash.update(key);
    hash.update('\0');
    hash.update(data[key]);
    hash.update('\0');
  }
  return hash.digest('hex').slice(0, 16);
}
