import fs from 'fs';
import path from 'path';

function loadDotEnv(): void {
  const envPath = path.resolve(process.cwd(), '.env');
  if (!fs.existsSync(envPath)) {
    return;
  }

  const contents = fs.readFileSync(envPath, 'utf8');
  for (const line of contents.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const separatorIndex = trimmed.indexOf('=');
    if (separatorIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, separatorIndex).trim();
    if (!key) {
      continue;
    }

    let value = trimmed.slice(separatorIndex + 1).trim();
    const hasMatchingQuotes =
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"));
    if (hasMatchingQuotes) {
      value = value.slice(1, -1);
    }

    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

async function main(): Promise<void> {
  loadDotEnv();

  // Configuration is read at import time, so these load after the .env file.
  const { createApp } = await import('./app');
  const { StaticAccessGate } = await import('./auth/accessGate');
  const { defaultPlatformConfig } = await import('./config/constants');
  const { CrowdfundEngine } = await import('./services/CrowdfundEngine');
  const { SqliteBalanceStore } = await import('./store/balanceStore');
  const { SqliteLedgerRepository } = await import('./store/ledgerRepository');
  const { CustodyLedger } = await import('./transfer/CustodyLedger');

  const platform = defaultPlatformConfig();
  const repository = await SqliteLedgerRepository.open();
  const custody = await CustodyLedger.open(await SqliteBalanceStore.open());
  const engine = await CrowdfundEngine.hydrate({
    transfers: custody,
    gate: new StaticAccessGate(platform.owner),
    platform,
    repository,
  });

  const port = Number(process.env.PORT ?? 3001);
  const host = process.env.HOST ?? '127.0.0.1';

  const server = createApp({ engine, wallet: custody }).listen(port, host, () => {
    if (process.env.NODE_ENV !== 'production') {
      console.log(
        `[config] owner=${platform.owner} feeBps=${platform.feeBps} allowedTokens=${platform.allowedTokens.length}`,
      );
    }
    console.log(`Crowdvault backend listening on http://${host}:${port}`);
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[server] ${signal} received, draining queued operations`);
    server.close();
    engine
      .idle()
      .then(() => repository.database.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[server] shutdown failed', err);
        process.exit(1);
      });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err) => {
  console.error('[server] failed to start', err);
  process.exit(1);
});
