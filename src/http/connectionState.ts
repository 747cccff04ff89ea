import { ConnectionEvent, ConnectionState } from "../enums";

type TransitionTable = Record<
  ConnectionState,
  Partial<Record<ConnectionEvent, ConnectionState>>
>;

/**
 * Every legal move of a connection. Events missing from a row leave the
 * state where it is: bytes for a pipelined request arriving while the
 * current one is being processed, for instance.
 */
export const CONNECTION_TRANSITIONS: TransitionTable = {
  [ConnectionState.IDLE]: {
    [ConnectionEvent.DATA_RECEIVED]: ConnectionState.READING_REQUEST,
    [ConnectionEvent.HEAD_COMPLETE]: ConnectionState.PROCESSING,
    [ConnectionEvent.NEXT_CYCLE]: ConnectionState.PROCESSING,
    [ConnectionEvent.CLOSE]: ConnectionState.CLOSING,
    [ConnectionEvent.TRANSPORT_CLOSED]: ConnectionState.CLOSED,
  },
  [ConnectionState.READING_REQUEST]: {
    [ConnectionEvent.HEAD_COMPLETE]: ConnectionState.PROCESSING,
    [ConnectionEvent.CLOSE]: ConnectionState.CLOSING,
    [ConnectionEvent.TRANSPORT_CLOSED]: ConnectionState.CLOSED,
  },
  [ConnectionState.PROCESSING]: {
    [ConnectionEvent.RESPONSE_STARTED]: ConnectionState.WRITING_RESPONSE,
    [ConnectionEvent.RESPONSE_COMPLETE]: ConnectionState.IDLE,
    [ConnectionEvent.CLOSE]: ConnectionState.CLOSING,
    [ConnectionEvent.TRANSPORT_CLOSED]: ConnectionState.CLOSED,
  },
  [ConnectionState.WRITING_RESPONSE]: {
    [ConnectionEvent.RESPONSE_COMPLETE]: ConnectionState.IDLE,
    [ConnectionEvent.CLOSE]: ConnectionState.CLOSING,
    [ConnectionEvent.TRANSPORT_CLOSED]: ConnectionState.CLOSED,
  },
  [ConnectionState.CLOSING]: {
    [ConnectionEvent.TRANSPORT_CLOSED]: ConnectionState.CLOSED,
  },
  [ConnectionState.CLOSED]: {},
};

export function nextState(
  state: ConnectionState,
  event: ConnectionEvent
): ConnectionState | null {
  return CONNECTION_TRANSITIONS[state][event] ?? null;
}
