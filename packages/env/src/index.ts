export { getAppConfig, loadAppConfig, type AppConfig } from './config.ts';
