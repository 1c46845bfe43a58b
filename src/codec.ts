import type { DecodeResult, SyncPacket } from './types.js';

/**
 * Every packet has the same size in both directions so that request and
 * reply spend the same time on the wire.
 */
export const PACKET_LENGTH = 32;
/** ASCII `drft` read as a little-endian u32. */
export const PROTOCOL_MAGIC = 0x74667264;
export const FLAG_REPLY = 1 << 0;

// Byte offsets within the packet.
const MAGIC_AT = 0;
const FLAGS_AT = 4;
const LOCAL_AT = 8;
const REMOTE_AT = 16;

function writePacket(flags: number, local: number, remote: number): Buffer {
  // alloc() zero-fills, which also clears the reserved field.
  const buffer = Buffer.alloc(PACKET_LENGTH);
  buffer.writeUInt32LE(PROTOCOL_MAGIC, MAGIC_AT);
  buffer.writeUInt32LE(flags, FLAGS_AT);
  buffer.writeBigUInt64LE(BigInt(Math.trunc(local)), LOCAL_AT);
  buffer.writeBigUInt64LE(BigInt(Math.trunc(remote)), REMOTE_AT);
  return buffer;
}

/**
 * Builds a request carrying the sender's local time.
 *
 * @param localTimestamp - Send instant in microseconds.
 */
export function encodeRequest(localTimestamp: number): Buffer {
  return writePacket(0, localTimestamp, 0);
}

/**
 * Builds the server's answer to `request`: the local timestamp is echoed,
 * the reply flag set and the responder's clock written to `remote`.
 */
export function encodeReply(request: Pick<SyncPacket, 'local'>, remoteTimestamp: number): Buffer {
  return writePacket(FLAG_REPLY, request.local, remoteTimestamp);
}

/** Reads a packet without checking its direction. */
export function decodePacket(data: Uint8Array): DecodeResult {
  if (data.byteLength !== PACKET_LENGTH) return { ok: false, reason: 'length' };

  const buffer = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (buffer.readUInt32LE(MAGIC_AT) !== PROTOCOL_MAGIC) return { ok: false, reason: 'magic' };

  return {
    ok: true,
    packet: {
      flags: buffer.readUInt32LE(FLAGS_AT),
      local: Number(buffer.readBigUInt64LE(LOCAL_AT)),
      remote: Number(buffer.readBigUInt64LE(REMOTE_AT)),
    },
  };
}

/**
 * Decodes a datagram received by the client. Anything that is not a
 * well-formed reply is reported as a failure; this never throws.
 */
export function decodeReply(data: Uint8Array): DecodeResult {
  const result = decodePacket(data);
  if (result.ok && (result.packet.flags & FLAG_REPLY) === 0) {
    return { ok: false, reason: 'not-reply' };
  }
  return result;
}
