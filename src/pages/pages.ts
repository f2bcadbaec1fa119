/**
 * Informational pages: GET / and GET /config.
 *
 * @module pages/pages
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { ConfigStore } from '../config/index.js';

const HTML_CONTENT_TYPE = 'text/html; charset=utf-8';

const STYLE = `
      body { margin: 0; font-family: "Helvetica Neue", Helvetica, Arial, sans-serif; font-size: 14px; color: #333; }
      .navbar { display: flex; background-color: #222; margin: 0; }
      .navbar > * { margin: 0; padding: 15px; }
      .navbar a { color: #9d9d9d; text-decoration: none; }
      .navbar a:hover { color: #fff; }
      body > * { margin: 15px; }
      pre { padding: 10px; font-size: 13px; background-color: #f5f5f5; border: 1px solid #ccc; }`;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Wrap page content in the shared layout. */
export function renderPage(content: string): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <title>Alert Ticket Bridge</title>
    <style>${STYLE}
    </style>
  </head>
  <body>
    <div class="navbar">
      <div><a href="/">Alert Ticket Bridge</a></div>
      <div><a href="/config">Configuration</a></div>
      <div><a href="/metrics">Metrics</a></div>
    </div>
    ${content}
  </body>
</html>
`;
}

export function renderHomePage(): string {
  return renderPage(
    '<p>This is a webhook receiver for Prometheus Alertmanager that files tickets in an issue tracker. ' +
      'Point an Alertmanager <code>webhook_config</code> at <code>/alert</code>.</p>',
  );
}

export function renderConfigPage(configText: string): string {
  return renderPage(`<h2>Configuration</h2>\n    <pre>${escapeHtml(configText)}</pre>`);
}

export function createPagesRouter(store: ConfigStore): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.type(HTML_CONTENT_TYPE).send(renderHomePage());
  });

  router.get('/config', (_req: Request, res: Response) => {
    res.type(HTML_CONTENT_TYPE).send(renderConfigPage(store.current().toDisplayString()));
  });

  return router;
}
