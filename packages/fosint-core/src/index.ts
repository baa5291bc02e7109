export * from './types/index.js';
export * from './utils/logger.js';
export * from './utils/errors.js';
export * from './utils/paths.js';
export * from './utils/files.js';
export * from './utils/csv.js';
export * from './utils/guards.js';
// Settings (config/settings.json)
export * from './settings/index.js';
// Transport
export * from './net/http.js';
export * from './net/rate-limiter.js';
export * from './net/url.js';
export * from './tor/tor-session.js';
export * from './tor/control.js';
export * from './tor/tor-handler.js';
export * from './tor/torrc.js';
// Accounts and projects
export * from './auth/crypto.js';
export * from './auth/user-store.js';
export * from './auth/session-manager.js';
export * from './projects/project-manager.js';
// OSINT modules
export { OsintModule } from './modules/base.js';
export type { ModuleContext } from './modules/base.js';
export * from './modules/leak-checker.js';
export * from './modules/pgp-search.js';
export * from './modules/crypto-tracker.js';
export * from './modules/dorking.js';
export * from './modules/darkweb-scanner.js';
export * from './modules/metadata-extractor.js';
export * from './modules/host-intel.js';
export * from './modules/keyword-monitor.js';
// Reports
export * from './reports/report-generator.js';
