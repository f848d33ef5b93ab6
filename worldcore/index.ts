// worldcore/index.ts

// Config
export * from "./config/logconfig";
export * from "./config/reinforcementConfig";

// Core
export * from "./core/CallQueue";
export * from "./core/ManualCallQueue";

// Utils
export * from "./utils/logger";
export * from "./utils/Rng";

// Host seams
export * from "./world/WorldTypes";
export type { WorldQueryFacade } from "./world/WorldQueryFacade";
export type { NotificationSink } from "./world/NotificationSink";
export * from "./world/SpawnFramework";
export * from "./world/WorldEventBus";

// Reinforcement core
export * from "./reinforcement/WaveTypes";
export * from "./reinforcement/WaveTable";
export * from "./reinforcement/SpawnProfiles";
export * from "./reinforcement/AiTuning";
export * from "./reinforcement/CombatDetector";
export * from "./reinforcement/EscalationStateMachine";
export * from "./reinforcement/SpawnedWaveAssets";
export * from "./reinforcement/ReinforcementNotifier";
export type { WaveTarget, WaveTrigger } from "./reinforcement/WaveTrigger";
export * from "./reinforcement/WaveOrchestrator";
export * from "./reinforcement/CycleRidingOrchestrator";
export * from "./reinforcement/LifecycleGuard";
export * from "./reinforcement/SpawnPointRegistry";
export * from "./reinforcement/CoordinatorElector";
export type { ReinforcementContext } from "./reinforcement/ReinforcementContext";
export * from "./reinforcement/PatrolSpawnPoint";
export * from "./reinforcement/DefenderSpawnPoint";
export * from "./reinforcement/AttackerSpawnPoint";
export * from "./reinforcement/ReinforcementServices";

// In-memory host
export * from "./sim/SimWorld";
export * from "./sim/SimPatrolCycle";
export * from "./sim/SimNotificationSink";
