export { createSimulation, createStore, SimulationSetup } from './agora';
export { RecordStore, deriveSlug, buildSnippet } from './record_store';
export { resolveStorePath, toLocation } from './path_resolver';
export { seedIfEmpty, loadSeedSpec, SEED_AUTHOR } from './seed';
export { createActionPolicy, decide, ActionPolicy } from './policy';
export { SimulationLoop } from './loop';
export { OllamaGenerator } from './generator';
export { loadRoster } from './roster';
export { createRng } from './random';
export * from './errors';
