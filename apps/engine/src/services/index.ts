export { HeartbeatService } from './heartbeat.service';
export type { HeartbeatConfig } from './heartbeat.service';
