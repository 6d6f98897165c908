// PV Web Socket gateway messages (JSON text frames)

// Client -> gateway
export type PvwsClientMessage =
  | { type: 'subscribe'; pvs: string[] }
  | { type: 'clear'; pvs: string[] }
  | { type: 'echo'; body: string };

// Gateway -> client. After the first update for a PV only changed fields are sent.
export interface PvwsUpdate {
  pv: string;
  value?: number | number[];
  seconds?: number;
  nanos?: number;
  severity?: string;
}

export type PvwsEvents = {
  connected: { reconnect: boolean };
  disconnected: { code: number; reason: string };
  update: PvwsUpdate;
  error: Error;
};
