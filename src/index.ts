/** Library entry point. */
export { makeCli } from './cli';
export { loadRepackConfig } from './cli/config/load';
export type { RepackConfig } from './cli/config/schema';
export * from './runner/pipeline';
