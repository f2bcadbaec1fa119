export { createPagesRouter, escapeHtml, renderConfigPage, renderHomePage, renderPage } from './pages.js';
