import type { Config } from 'drizzle-kit';

// Build connection string from individual environment variables
const env = process.env;
const credentials = `${env.DATABASE_USERNAME ?? ''}:${encodeURIComponent(env.DATABASE_PASSWORD ?? '')}`;
const sslMode = env.DATABASE_SSL === 'require' ? 'require' : 'disable';
const connectionString = `postgresql://${credentials}@${env.DATABASE_HOST ?? 'localhost'}:${env.DATABASE_PORT ?? '5432'}/${env.DATABASE_NAME ?? 'gapless'}?sslmode=${sslMode}`;

export default {
  schema: './src/schema/index.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: connectionString,
  },
} satisfies Config;
