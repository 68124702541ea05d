export * from './errors/MonitorError';
export * from './errors/ClientError';
export * from './errors/ConfigError';
export * from './diagnostics/logger';
export * from './config/monitorConfig';
export * from './transport/trustAnchor';
export * from './transport/localCredential';
export { RpcConnection, type RpcConnectionOptions } from './transport/rpcConnection';
export * from './device/positionTypes';
export * from './device/runState';
export * from './device/runStateResolver';
export * from './device/channelTopology';
export * from './device/positionSession';
export type { AcquisitionService, StopDataAction } from './protocol/acquisitionClient';
export type { ProtocolRunService } from './protocol/protocolClient';
export type { StatisticsService } from './protocol/statisticsClient';
export type { ChannelStateService } from './protocol/dataClient';
export type { ChannelLayoutService } from './protocol/deviceClient';
export type { DiscoveryService } from './protocol/managerClient';
export * from './session/reconnectPolicy';
export * from './session/sessionManager';
export * from './session/monitorSession';
export * from './session/rpcSessionConnector';
export * from './telemetry/acquisitionStats';
export * from './telemetry/yieldHistory';
export * from './telemetry/dutyTime';
export * from './telemetry/readLengthHistogram';
export * from './telemetry/channelStates';
export * from './telemetry/telemetryStore';
export * from './telemetry/monitorPoller';
export * from './control/runControlService';
