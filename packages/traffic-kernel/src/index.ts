// @lanewatch/traffic-kernel
// Entry point exports for the lane analytics engine.

export * from "./engine";
export * from "./lanes/geometry";
export * from "./lanes/lane_assigner";
export * from "./lanes/lane_validation";
export * from "./tracks/track_state_manager";
export * from "./speed/speed_estimator";
export * from "./incidents/incident_detector";
export * from "./aggregate/los";
export * from "./aggregate/lane_aggregator";
export * from "./trend/trend_predictor";
export * from "./history/history_buffer";
export * from "./history/heatmap_accumulator";
export * from "./priority/priority_controller";
export * from "./priority/signal_plan";
export * from "./sinks/sinks";
export * from "./sinks/sink_dispatcher";
export * from "./stats/session_stats";
export * from "./util/ring_buffer";
export * from "./util/logger";
