export {
  ColonistRuntime,
  countTasks,
  resolveUsername,
  type ColonistRuntimeOptions,
  type TickReport,
  type TickStatus,
} from './runtime.js';
export {
  createEngineContext,
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  withUsername,
  type EngineConfig,
  type EngineConfigOverrides,
  type EngineContext,
} from './config.js';
export {
  createConsoleTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
  type ConsoleTelemetryOptions,
  type TelemetryEventData,
  type TelemetryFacade,
  type TelemetryLevel,
} from './telemetry.js';
export {
  defineAttribute,
  entityGeneration,
  entityIndex,
  EntityStore,
  formatEntity,
  AttributeType,
  type AttributeCodec,
  type Entity,
  type EntityRefReader,
  type EntityRefWriter,
  type ErasedAttribute,
} from './entity-store.js';
export {
  ChildList,
  describeOwner,
  directiveOwner,
  missionOwner,
  NO_OWNER,
  ownerEntity,
  OwnershipInvariantError,
  type DirectiveOwner,
  type JobOwnerRef,
  type MissionOwner,
  type MissionOwnerRef,
  type NoOwner,
  type OwnerRef,
} from './ownership.js';
export {
  RUNNING,
  SUCCESS,
  TASK_OK,
  replaceWith,
  taskFailure,
  taskSuccess,
  type TaskError,
  type TaskOutcome,
  type TaskRunResult,
} from './task-outcome.js';
export type {
  JobTickContext,
  MissionTickContext,
  OwningTaskCapability,
  TaskCapability,
  UnitRequest,
} from './task-types.js';
export {
  runStateMachine,
  runStateMachineResult,
  type MachineState,
  type StateMachineOptions,
} from './state-machine.js';
export { PhasedTask, type Phase } from './phased-task.js';
export {
  completeDirective,
  completeJob,
  completeMission,
  destroyTaskEntity,
  findDanglingOwners,
  findDependents,
  findTask,
  linkToOwner,
  repairEntityIntegrity,
  replaceDirective,
  replaceJob,
  replaceMission,
  type DanglingOwner,
  type IntegrityReport,
  type TaskDependent,
  type TaskHandle,
} from './task-lifecycle.js';
export {
  asDirective,
  DirectiveDataAttribute,
  hydrateDirectiveData,
  serializeDirectiveData,
  type DirectiveCapability,
  type DirectiveData,
  type DirectiveKind,
  type SerializedDirectiveData,
} from './directives/directive-types.js';
export {
  ALWAYS_ON_DIRECTIVES,
  createClaimDirective,
  createColonyDirective,
  createDirective,
  createDirectiveEntity,
  createMiningOutpostDirective,
  type DirectiveBuilderOptions,
} from './directives/directive-builders.js';
export { DIRECTIVE_RUN_INTERVAL } from './directives/directive-base.js';
export { ClaimDirective } from './directives/claim-directive.js';
export { ColonyDirective, SCOUT_REFRESH_TICKS } from './directives/colony-directive.js';
export {
  isOutpostCandidate,
  MiningOutpostDirective,
} from './directives/mining-outpost-directive.js';
export {
  asMission,
  hydrateMissionData,
  MissionDataAttribute,
  serializeMissionData,
  type MissionCapability,
  type MissionData,
  type MissionKind,
  type SerializedMissionData,
} from './missions/mission-types.js';
export {
  createClaimMission,
  createColonyMission,
  createDismantleMission,
  createMissionEntity,
  createRemoteMineMission,
  createReserveMission,
  createScoutMission,
  roomHasMission,
  type MissionBuilderOptions,
} from './missions/mission-builders.js';
export { SpawnPriority } from './missions/mission-base.js';
export { ClaimMission, isClaimedByOther } from './missions/claim-mission.js';
export { ColonyMission } from './missions/colony-mission.js';
export { DismantleMission } from './missions/dismantle-mission.js';
export { RemoteMineMission } from './missions/remote-mine-mission.js';
export { ReserveMission } from './missions/reserve-mission.js';
export { MAX_SCOUT_ATTEMPTS, nextScoutDelay, ScoutMission } from './missions/scout-mission.js';
export {
  asJob,
  hydrateJobData,
  JobDataAttribute,
  serializeJobData,
  UnitBindingAttribute,
  type JobCapability,
  type JobData,
  type JobKind,
  type SerializedJobData,
  type UnitBinding,
} from './jobs/job-types.js';
export {
  createBuildJob,
  createClaimJob,
  createDismantleJob,
  createHarvestJob,
  createHaulJob,
  createJobEntity,
  createReserveJob,
  createScoutJob,
  createUpgradeJob,
  type JobBuilderOptions,
} from './jobs/job-builders.js';
export { ActionFlag, SimultaneousActionFlags } from './jobs/action-flags.js';
export { BuildJob } from './jobs/build-job.js';
export { ClaimJob } from './jobs/claim-job.js';
export { DismantleJob, findDismantleTargets } from './jobs/dismantle-job.js';
export { HarvestJob } from './jobs/harvest-job.js';
export { HaulJob } from './jobs/haul-job.js';
export { ReserveJob } from './jobs/reserve-job.js';
export { ScoutJob } from './jobs/scout-job.js';
export { UpgradeJob } from './jobs/upgrade-job.js';
export {
  observeRoom,
  RoomData,
  RoomDataAttribute,
  type RoomObservation,
} from './room/room-data.js';
export {
  ensureRoomEntity,
  getRoomRef,
  nearestRoom,
  ownedRooms,
  type RoomRef,
} from './room/room-entities.js';
export { RoomNameIndex } from './caches/room-name-index.js';
export {
  computeStructureCosts,
  IMPASSABLE_COST,
  PathCostCache,
} from './caches/path-cost-cache.js';
export {
  MemoryArbiter,
  segmentByteLength,
  type SegmentRequirementOptions,
} from './memory/memory-arbiter.js';
export {
  captureSnapshot,
  chunkByBytes,
  PERSISTENT_ATTRIBUTES,
  readSnapshot,
  restoreSnapshot,
  SNAPSHOT_VERSION,
  storeSnapshotSchema,
  writeSnapshot,
  type RestoreSnapshotResult,
  type StoreSnapshot,
} from './state-sync/snapshot.js';
export { createCoreSystems, type CoreSystemsOptions } from './systems/core-systems.js';
export { createDirectiveSystem } from './systems/directive-system.js';
export { createMissionSystem } from './systems/mission-system.js';
export { createJobSystem } from './systems/job-system.js';
export { createDirectiveManagerSystem } from './systems/directive-manager-system.js';
export { createRoomDataSystem } from './systems/room-data-system.js';
export { createRoomNameIndexSystem } from './systems/room-name-index-system.js';
export { createPathCostSystem } from './systems/path-cost-system.js';
export { registerSystems, type SystemHost } from './systems/system-registry.js';
export type { TaskSystemOptions } from './systems/task-execution.js';
export type { System, SystemDefinition, TickContext } from './systems/system-types.js';
export {
  DescribeLog,
  discardDescribeSink,
  type DescribeEntry,
  type DescribeSink,
  type TaskLevel,
} from './diagnostics/describe-sink.js';
export {
  createTickTimelineRecorder,
  toErrorLike,
  type ErrorLike,
  type TickTimelineEntry,
  type TickTimelineResult,
} from './diagnostics/tick-timeline.js';
