export { MatchEngineAgent, TickError } from './agents/MatchEngineAgent';
export type { StepResult } from './agents/MatchEngineAgent';
export { PhysicsAgent } from './agents/PhysicsAgent';
export { StatsAgent } from './agents/StatsAgent';
export * from './agents/engine/engineMath';
export { getMaxAcceleration, getMaxSpeed } from './agents/engine/engineTypes';
export type { MovingTarget, SimPlayer, SteeringActor } from './agents/engine/engineTypes';
export { calculateSteering, desiredArriveSpeed, predictPosition } from './agents/engine/steering';
export type { SteeringBehavior, SteeringOutput } from './agents/engine/steering';
export {
  evaluateNetwork,
  getSharedNetworkRegistry,
  loadNetwork,
  NETWORK_IDS,
  NETWORK_SHAPES,
  NetworkLoadError,
  NetworkRegistry
} from './agents/engine/neuralNetwork';
export type { Activation, DenseLayer, NetworkProvider, NetworkShape, NeuralNetwork } from './agents/engine/neuralNetwork';
export { makeRng, mixSeed, rngFor } from './agents/engine/random';
export type { Rng } from './agents/engine/random';
export { buildTickContext } from './agents/engine/tickContext';
export type { StateProcessingContext, TickContext } from './agents/engine/tickContext';
export { evaluatePlayer, getStateHandler } from './agents/engine/stateMachine';
export { aggregateTickResults, compareIds } from './agents/engine/resultEngine';
export { commitEvents, resolveLooseBall } from './agents/engine/commitEngine';
export { TUNING } from './data/tuning';
export type { EngineTuning } from './data/tuning';
export * from './domain/simulationTypes';
export type * from './domain/matchTypes';
export { logger } from './logger';
