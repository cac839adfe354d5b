import { defineConfig } from 'drizzle-kit';

const getDatabaseUrl = () => {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required for reporting-service.');
  }
  return databaseUrl;
};

export default defineConfig({
  schema: './src/schema/reporting-schema.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: getDatabaseUrl(),
  },
  tablesFilter: ['transactions', 'equipment_metrics'],
  verbose: true,
  strict: true,
});
