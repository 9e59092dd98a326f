export * from './charts/index.js'
export { loadConfig, type ResolverConfig, type TimeoutBudget } from './config/index.js'
