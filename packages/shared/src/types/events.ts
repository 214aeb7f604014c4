export interface EventBusMessage {
  id: string;
  type: string;
  source: string;
  timestamp: Date;
  data: unknown;
}

export interface DiskStatsRefreshEvent {
  timestamp: Date;
  devices: string[];
  failures: number;
}

export interface DiskStatsMalformedEvent {
  timestamp: Date;
  failures: { lineNumber: number; reason: string }[];
}

export interface DiskStatsErrorEvent {
  timestamp: Date;
  source: string;
  message: string;
}
