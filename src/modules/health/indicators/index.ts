export * from './rate-updater.health';
