export {
  DispatchEngine,
  type DispatchEngineOptions,
  type EngineEvent,
  type EngineListener,
  type EngineStats,
  type PlaybackEndReason,
  type SinkTarget,
} from './dispatchEngine';
export { DeviceState, type ActivePlayback, type NodeContribution, type NodeOutput } from './deviceState';
export { TaskScheduler, type TaskId, type TaskSchedulerOptions } from './taskScheduler';
export { LatencyMetrics, type LatencyMeasurement, type LatencyStats } from './latencyMetrics';
export * from './sinks';
