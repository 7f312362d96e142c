import { StoredValue } from './catalog';

export interface SessionRecordCount {
  sessionId: string | null;
  recordCount: number;
}

export interface ParticipantSensorStats {
  sensorName: string;
  description: string | null;
  sessionStats: SessionRecordCount[];
}

export interface ParticipantOverview {
  participantId: string;
  participantInfo: Record<string, StoredValue>;
  sensorStats: ParticipantSensorStats[];
}
