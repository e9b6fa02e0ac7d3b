/**
 * Plugins Module
 *
 * Speech plugin construction for the agent session.
 *
 * @module plugins
 */

export { createPlugins, createPluginsFromEnv } from './factory.js';

export type { LLMConfig, PluginBundle, PluginFactoryConfig } from './types.js';
