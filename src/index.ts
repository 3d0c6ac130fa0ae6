export type {
  Action,
  State,
  Agent,
  ActionValueLookup,
  ExplorationStrategy,
  LearningStrategy,
  TerminationStrategy,
  ActionValue,
  LearnedValue,
  TerminalValue,
  TrainingStep,
  TerminationReason,
  TrainingSummary,
  TrainerHooks,
  TrainerOptions,
} from "./types";

export type { RandomSource, EpsilonGreedyOptions } from "./exploration";
export { AgentTrainer, createTrainer } from "./trainer";
export { QTable } from "./q-table";
export { RandomExploration, EpsilonGreedyExploration, pickGreedy } from "./exploration";
export { QLearning } from "./learning";
export { FixedIterations, SinkStates, TimeLimit } from "./termination";
export { InvalidHyperparameterError } from "./errors";
