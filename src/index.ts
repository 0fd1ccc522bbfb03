/**
 * agentry — agent lifecycle control over pluggable communicators.
 *
 * @example
 * const registry = createDefaultRegistry({ logger: createLogger() });
 * const config = unwrap(await loadAgentConfig({ filePath: 'agent.json', envFile: '.env' }));
 * const agent = await createAgent({ config, hooks, registry });
 * await runAgent(agent);
 */
export * from './core/index.js';
export * from './config/index.js';
export * from './observability/index.js';
export * from './communication/index.js';
export * from './agent/index.js';
export * from './runtime/index.js';
