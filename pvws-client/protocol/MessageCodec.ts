import { PvwsClientMessage, PvwsUpdate } from '../types/messages';

export class PvwsProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PvwsProtocolError';
  }
}

// JSON cannot carry non-finite doubles, the gateway sends them as strings
const SPECIAL_NUMBERS: Record<string, number> = {
  NaN: NaN,
  Infinity: Infinity,
  '-Infinity': -Infinity,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(message: Record<string, unknown>, key: string): number | undefined {
  const value = message[key];
  if (value === undefined) return undefined;
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value in SPECIAL_NUMBERS) return SPECIAL_NUMBERS[value];
  throw new PvwsProtocolError(`Field "${key}" is not a number`);
}

export class MessageCodec {
  static encode(message: PvwsClientMessage): string {
    return JSON.stringify(message);
  }

  /**
   * Parse a gateway frame. Returns null for frames that are not PV updates.
   * @throws PvwsProtocolError on malformed JSON or update fields
   */
  static decode(raw: string): PvwsUpdate | null {
    const parsed = this.parseJson(raw);
    if (!isRecord(parsed) || typeof parsed.type !== 'string') {
      throw new PvwsProtocolError('Frame has no message type');
    }
    if (parsed.type !== 'update') return null;

    if (typeof parsed.pv !== 'string' || parsed.pv.length === 0) {
      throw new PvwsProtocolError('Update has no PV name');
    }

    const update: PvwsUpdate = { pv: parsed.pv };

    if (typeof parsed.b64dbl === 'string') {
      update.value = this.decodeFloat64Array(parsed.b64dbl);
    } else if (typeof parsed.b64int === 'string') {
      update.value = this.decodeInt32Array(parsed.b64int);
    } else if (Array.isArray(parsed.value)) {
      update.value = parsed.value.map((item, index) => {
        if (typeof item !== 'number') throw new PvwsProtocolError(`Array element ${index} is not a number`);
        return item;
      });
    } else {
      const value = optionalNumber(parsed, 'value');
      if (value !== undefined) update.value = value;
    }

    const seconds = optionalNumber(parsed, 'seconds');
    if (seconds !== undefined) update.seconds = seconds;
    const nanos = optionalNumber(parsed, 'nanos');
    if (nanos !== undefined) update.nanos = nanos;
    if (typeof parsed.severity === 'string') update.severity = parsed.severity;

    return update;
  }

  private static parseJson(raw: string): unknown {
    try {
      return JSON.parse(raw);
    } catch {
      throw new PvwsProtocolError('Frame is not valid JSON');
    }
  }

  // Waveforms arrive as base64 of little-endian float64
  static decodeFloat64Array(encoded: string): number[] {
    const bytes = Buffer.from(encoded, 'base64');
    if (bytes.length % 8 !== 0) {
      throw new PvwsProtocolError(`b64dbl payload of ${bytes.length} bytes is not a float64 array`);
    }
    const values = new Array<number>(bytes.length / 8);
    for (let i = 0; i < values.length; i++) {
      values[i] = bytes.readDoubleLE(i * 8);
    }
    return values;
  }

  static decodeInt32Array(encoded: string): number[] {
    const bytes = Buffer.from(encoded, 'base64');
    if (bytes.length % 4 !== 0) {
      throw new PvwsProtocolError(`b64int payload of ${bytes.length} bytes is not an int32 array`);
    }
    const values = new Array<number>(bytes.length / 4);
    for (let i = 0; i < values.length; i++) {
      values[i] = bytes.readInt32LE(i * 4);
    }
    return values;
  }

  // Inverse of decodeFloat64Array, for gateway stand-ins
  static encodeFloat64Array(values: readonly number[]): string {
    const bytes = Buffer.alloc(values.length * 8);
    values.forEach((value, i) => bytes.writeDoubleLE(value, i * 8));
    return bytes.toString('base64');
  }
}
