#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import fs from 'fs';
import { CoinConfigLoader } from './config/loader';
import { loadSettings, type WatcherSettings } from './config/settings';
import { AddressStateStore } from './services/state';
import { RefreshOrchestrator } from './services/refresher';
import { ViewRenderer } from './services/view';
import { ProviderRegistry } from './services/providers/registry';
import { createExplorerHttp } from './services/providers/http';
import { createStatusApp } from './server/app';

dotenv.config();

interface Watcher {
  store: AddressStateStore;
  refresher: RefreshOrchestrator;
  renderer: ViewRenderer;
}

function buildWatcher(configPath: string, settings: WatcherSettings): Watcher {
  const loaded = CoinConfigLoader.load(configPath);
  if (!loaded.ok) {
    console.error(loaded.error.message);
    for (const issue of loaded.error.issues) console.error(`  - ${issue}`);
    process.exit(1);
  }

  const store = new AddressStateStore();
  store.loadInitial(loaded.config.coins);

  const providers = ProviderRegistry.withDefaults(createExplorerHttp(settings.fetchTimeoutMs));
  const refresher = new RefreshOrchestrator(store, providers, {
    minIntervalMs: settings.refreshIntervalMs,
    requestDelayMs: settings.fetchDelayMs,
    debug: settings.debug,
  });

  const count = store.snapshotForUpdate().length;
  console.log(`Tracking ${count} address(es) across ${loaded.config.coins.length} coin(s) from ${configPath}`);
  return { store, refresher, renderer: new ViewRenderer(providers) };
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError(`Invalid port: ${value}`);
  }
  return port;
}

const program = new Command();

program
  .name('wallet-watcher')
  .description('Watch balances and last activity of crypto addresses through block explorer APIs')
  .version('1.0.0');

program
  .command('init')
  .description('Write a sample coins.json and .env')
  .action(() => {
    const sample = {
      coins: [
        { name: 'Dogecoin', ticker: 'DOGE', api: 'chainz', addresses: [{ address: 'DReplaceWithYourAddress' }] },
        { name: 'Bellscoin', ticker: 'BEL', api: 'blnscan', addresses: [{ address: 'BReplaceWithYourAddress' }] },
      ],
    };

    if (!fs.existsSync('coins.json')) {
      fs.writeFileSync('coins.json', JSON.stringify(sample, null, 2) + '\n');
      console.log('Created coins.json.');
    } else {
      console.log('coins.json already exists.');
    }

    if (!fs.existsSync('.env')) {
      fs.writeFileSync(
        '.env',
        '# Wallet watcher settings\nWW_HOST=127.0.0.1\nWW_PORT=8080\nWW_FETCH_TIMEOUT_MS=10000\nWW_REFRESH_INTERVAL_MS=30000\nWW_FETCH_DELAY_MS=200\nWW_DEBUG=\n'
      );
      console.log('Created .env.');
    } else {
      console.log('.env already exists.');
    }
  });

program
  .command('serve', { isDefault: true })
  .description('Serve the wallet status page, refreshing on each request')
  .option('-c, --config <path>', 'path to the coin configuration', 'coins.json')
  .option('-p, --port <port>', 'port to listen on', parsePort)
  .option('--host <host>', 'interface to bind')
  .action((options: { config: string; port?: number; host?: string }) => {
    const settings = loadSettings();
    const { store, refresher, renderer } = buildWatcher(options.config, settings);
    const host = options.host ?? settings.host;
    const port = options.port ?? settings.port;

    const app = createStatusApp({ store, refresher, renderer });
    const server = app.listen(port, host, () => {
      console.log(`Wallet status available at http://${host}:${port}/`);
    });
    server.on('error', (err) => {
      console.error('Server error:', err);
      process.exit(1);
    });
  });

program
  .command('status')
  .description('Refresh once and print the status to the console')
  .option('-c, --config <path>', 'path to the coin configuration', 'coins.json')
  .action(async (options: { config: string }) => {
    const settings = loadSettings();
    const { store, refresher, renderer } = buildWatcher(options.config, settings);

    const summary = await refresher.refresh();
    for (const coin of renderer.render(store.snapshotForRender())) {
      console.log(`\n${coin.name} (${coin.ticker})`);
      for (const a of coin.addresses) {
        console.log(`  ${a.address}`);
        console.log(`    Balance: ${a.balance}`);
        console.log(`    Last Active On: ${a.lastActive}`);
        console.log(`    Time Since Last Activity: ${a.elapsed}`);
      }
    }
    console.log(`\n${summary.succeeded}/${summary.attempted} address(es) refreshed.`);
  });

program.parseAsync().catch((error: unknown) => {
  console.error('An error occurred:', error);
  process.exit(1);
});
