import express from 'express';
import type { AddressStateStore } from '../services/state';
import type { RefreshOrchestrator } from '../services/refresher';
import type { ViewRenderer } from '../services/view';
import { renderStatusPage } from './html';

export interface StatusAppDeps {
  store: AddressStateStore;
  refresher: RefreshOrchestrator;
  renderer: ViewRenderer;
  nowSeconds?: () => number;
}

export function createStatusApp(deps: StatusAppDeps): express.Express {
  const nowSeconds = deps.nowSeconds ?? (() => Math.floor(Date.now() / 1000));
  const app = express();
  app.disable('x-powered-by');

  app.get('/', async (_req: express.Request, res: express.Response, next: express.NextFunction) => {
    try {
      await deps.refresher.refresh();
      const view = deps.renderer.render(deps.store.snapshotForRender(), nowSeconds());
      res.status(200).type('html').send(renderStatusPage(view));
    } catch (e) {
      next(e);
    }
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('Failed to render status page:', err);
    res.status(500).type('text').send('Internal Server Error');
  });

  return app;
}
