export * from './core/section';
export { ConsoleService, type ConsoleEntry } from './core/console/ConsoleService';
