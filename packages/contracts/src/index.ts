export * from "./schema/observation_v1";
export * from "./schema/lane_v1";
export * from "./schema/lane_window_metrics_v1";
export * from "./schema/incident_v1";
export * from "./schema/priority_request_v1";
export * from "./schema/signal_plan_v1";
export * from "./schema/trend_v1";
export * from "./schema/history_bucket_v1";
export * from "./schema/log_record_v1";
export * from "./schema/dashboard_snapshot_v1";
export * from "./schema/analytics_config_v1";
