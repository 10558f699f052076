import { env } from './config/env';
import { RECORD_CACHE_TTL_MS } from './config/constants';
import { LoadedTable } from './types/expense';
import { CostDashboard } from './services/dashboard';
import { startHealthServer } from './services/health/server';
import { RecordCache } from './services/records';
import { GoogleSheetsStore } from './services/sheets';
import { createBot } from './services/telegram';
import { cleanupExpiredContexts } from './services/state/user-context';

async function main(): Promise<void> {
  try {
    console.log('Starting costsheet-bot...');

    const store = await GoogleSheetsStore.connect({
      credentialsJson: env.GOOGLE_CREDENTIALS_JSON,
      credentialsFile: env.GOOGLE_CREDENTIALS_FILE,
      spreadsheetId: env.SPREADSHEET_ID,
      spreadsheetName: env.SPREADSHEET_NAME,
    });

    const ttlMs = Number.isFinite(env.CACHE_TTL_SECONDS) ? env.CACHE_TTL_SECONDS * 1000 : RECORD_CACHE_TTL_MS;
    const dashboard = new CostDashboard({
      store,
      cache: new RecordCache<LoadedTable>(ttlMs),
      reportTitle: env.REPORT_TITLE,
    });

    const reconciled = await dashboard.reconfigure();
    if (reconciled.success) {
      console.log(`[Schema] ${reconciled.message}`);
    } else {
      console.warn(`[Schema] ${reconciled.message}`);
    }

    const bot = createBot(env.TELEGRAM_BOT_TOKEN, dashboard);
    const health = startHealthServer(env.HEALTH_PORT, () => ({
      store: store.describe(),
      cacheFresh: dashboard.cache.isFresh(),
    }));
    const cleanup = setInterval(() => cleanupExpiredContexts(), 60 * 1000);

    process.once('SIGINT', () => {
      console.log('\nShutting down...');
      clearInterval(cleanup);
      health.close();
      void bot.stop();
    });

    await bot.start();
  } catch (error) {
    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();
