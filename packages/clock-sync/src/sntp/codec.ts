/**
 * SNTP (RFC 4330) packet encoding and decoding.
 *
 * Only the fields a unicast client needs are handled: the request is a bare
 * 48-byte header, and the reply is reduced to the server's transmit
 * timestamp after the usual sanity checks.
 */

import { ClockSyncMalformedReplyError } from "@clockwork/errors";
import {
  NTP_UNIX_EPOCH_DELTA,
  SNTP_LEAP_UNSYNCHRONIZED,
  SNTP_MAX_STRATUM,
  SNTP_MODE_BROADCAST,
  SNTP_MODE_SERVER,
  SNTP_PACKET_SIZE,
  SNTP_REQUEST_HEADER,
  SNTP_TRANSMIT_OFFSET,
} from "../constants.js";

const TWO_POW_32 = 2 ** 32;

export interface SntpReply {
  /** Server transmit time, seconds since the Unix epoch (fractional) */
  readonly serverTime: number;
  readonly stratum: number;
  readonly leapIndicator: number;
  readonly version: number;
  readonly mode: number;
}

export type SntpDecodeResult =
  | { readonly success: true; readonly data: SntpReply }
  | { readonly success: false; readonly error: ClockSyncMalformedReplyError };

/**
 * Build a client request: LI 0, version 4, mode 3, every other field zero.
 */
export function encodeSntpRequest(): Buffer {
  const packet = Buffer.alloc(SNTP_PACKET_SIZE);
  packet.writeUInt8(SNTP_REQUEST_HEADER, 0);
  return packet;
}

/**
 * Convert a 64-bit NTP timestamp to Unix seconds.
 *
 * Seconds values with the top bit clear are taken to be in NTP era 1
 * (from 2036-02-07), following RFC 4330 section 3.
 */
export function ntpToUnixSeconds(seconds: number, fraction: number): number {
  const eraOffset = seconds < 0x80000000 ? TWO_POW_32 : 0;
  return seconds + eraOffset - NTP_UNIX_EPOCH_DELTA + fraction / TWO_POW_32;
}

function malformed(reason: string): SntpDecodeResult {
  return { success: false, error: new ClockSyncMalformedReplyError(reason) };
}

/**
 * Decode and validate a server reply.
 */
export function decodeSntpReply(packet: Uint8Array): SntpDecodeResult {
  if (packet.length < SNTP_PACKET_SIZE) {
    return malformed(`reply too short (${packet.length} bytes)`);
  }

  const view = Buffer.from(packet.buffer, packet.byteOffset, packet.byteLength);
  const header = view.readUInt8(0);
  const leapIndicator = header >> 6;
  const version = (header >> 3) & 0x07;
  const mode = header & 0x07;
  const stratum = view.readUInt8(1);

  if (mode !== SNTP_MODE_SERVER && mode !== SNTP_MODE_BROADCAST) {
    return malformed(`unexpected mode ${mode}`);
  }
  if (leapIndicator === SNTP_LEAP_UNSYNCHRONIZED) {
    return malformed("server clock is not synchronized");
  }
  if (stratum === 0) {
    const kissCode = view.toString("ascii", 12, 16).replace(/\0+$/, "");
    return malformed(`kiss-o'-death${kissCode ? ` (${kissCode})` : ""}`);
  }
  if (stratum > SNTP_MAX_STRATUM) {
    return malformed(`invalid stratum ${stratum}`);
  }

  const seconds = view.readUInt32BE(SNTP_TRANSMIT_OFFSET);
  const fraction = view.readUInt32BE(SNTP_TRANSMIT_OFFSET + 4);
  if (seconds === 0 && fraction === 0) {
    return malformed("zero transmit timestamp");
  }

  return {
    success: true,
    data: {
      serverTime: ntpToUnixSeconds(seconds, fraction),
      stratum,
      leapIndicator,
      version,
      mode,
    },
  };
}
