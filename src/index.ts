export {
  advancePeriod,
  createInitialState,
  runTokenomicsSimulation,
  SIM_ENGINE_VERSION,
  simulateTokenomics,
  summarizeSimulation,
} from "./core/tokenomics.js";
export type { EngineState, SimulationArtifacts } from "./core/tokenomics.js";
export {
  CIRCUIT_BREAKER_DAMPENING,
  CRITICAL_SUPPLY_THRESHOLD,
} from "./models/burn.js";
export { MARKET_CAP_DEPTH_SHARE } from "./models/priceImpact.js";
export { postSimulationCheck, preSimulationCheck } from "./risk/checks.js";
export type { CheckResult } from "./risk/checks.js";
export {
  DEFAULT_SIMULATION_INPUT,
  InvalidParameterError,
  parseParameterSet,
  TokenomicsSimulationInputSchema,
  toParameterSet,
} from "./schema.js";
export type * from "./types.js";
