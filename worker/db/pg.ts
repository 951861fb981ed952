import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { z } from 'zod';
import * as schema from './schema';

export type TrackerDatabase = NodePgDatabase<typeof schema>;

let pool: Pool | null = null;
let db: TrackerDatabase | null = null;

const credentialSchema = z
  .object({
    uri: z.string(),
    url: z.string(),
    jdbcUrl: z.string(),
    hostname: z.string(),
    host: z.string(),
    port: z.coerce.number().int(),
    username: z.string(),
    user: z.string(),
    password: z.string(),
    database: z.string(),
    dbname: z.string(),
  })
  .partial();

const vcapSchema = z.record(z.array(z.object({ credentials: credentialSchema.optional() })));

type Credential = z.infer<typeof credentialSchema>;

const connectionStringFrom = (cred: Credential): string | null => {
  if (cred.uri) return cred.uri;
  if (cred.url) return cred.url;
  if (cred.jdbcUrl) return cred.jdbcUrl.replace(/^jdbc:/, '');

  const user = cred.username ?? cred.user;
  const host = cred.hostname ?? cred.host;
  const database = cred.database ?? cred.dbname;
  if (!user || !cred.password || !host || !database) return null;

  const port = cred.port ? `:${cred.port}` : '';
  return `postgres://${encodeURIComponent(user)}:${encodeURIComponent(cred.password)}@${host}${port}/${database}`;
};

/** `DATABASE_URL` wins; otherwise the first bound service with usable PostgreSQL credentials. */
export const resolveDatabaseUrl = (env: NodeJS.ProcessEnv = process.env): string | null => {
  if (env.DATABASE_URL) return env.DATABASE_URL;
  if (!env.VCAP_SERVICES) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(env.VCAP_SERVICES);
  } catch (error) {
    console.warn('Ignoring unparseable VCAP_SERVICES:', error);
    return null;
  }

  const parsed = vcapSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn('Ignoring VCAP_SERVICES with an unexpected shape.');
    return null;
  }

  for (const service of Object.values(parsed.data).flat()) {
    const connectionString = service.credentials ? connectionStringFrom(service.credentials) : null;
    if (connectionString) return connectionString;
  }
  return null;
};

const sslFor = (env: NodeJS.ProcessEnv) => {
  const mode = env.PGSSLMODE;
  if (mode === 'disable' || mode === 'allow') return undefined;
  // Platform-bound databases present certificates the pool cannot verify.
  return env.VCAP_SERVICES || mode === 'require' ? { rejectUnauthorized: false } : undefined;
};

export const getPgDb = (): TrackerDatabase => {
  if (!db) {
    const connectionString = resolveDatabaseUrl();
    if (!connectionString) {
      throw new Error('DATABASE_URL is not set and VCAP_SERVICES does not contain PostgreSQL credentials');
    }
    pool = new Pool({ connectionString, ssl: sslFor(process.env) });
    pool.on('error', (error) => {
      console.error('Idle PostgreSQL client failed:', error);
    });
    db = drizzle(pool, { schema });
  }
  return db;
};

export const closePgDb = async () => {
  if (!pool) return;
  const closing = pool;
  pool = null;
  db = null;
  await closing.end();
};
