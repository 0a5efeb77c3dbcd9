/**
 * Wire constants for the headset framing.
 * Frame format: HEADER [escaped: type + seq + 4-byte BE length + payload + checksum] TRAILER
 */

export const MESSAGE_HEADER = 0x3e;
export const MESSAGE_TRAILER = 0x3c;
export const ESCAPE_BYTE = 0x3d;
export const ESCAPE_MASK = 0b11101111;

// header + type + seq + 4 length bytes
export const FRAME_PREFIX_SIZE = 7;
// checksum + trailer
export const FRAME_SUFFIX_SIZE = 2;
export const MIN_FRAME_SIZE = FRAME_PREFIX_SIZE + FRAME_SUFFIX_SIZE;

export enum MessageType {
  Ack = 0x01,
  Command1 = 0x0c,
  Command2 = 0x0e,
}

export function messageTypeFromByte(byte: number): MessageType | undefined {
  switch (byte) {
    case MessageType.Ack: return MessageType.Ack;
    case MessageType.Command1: return MessageType.Command1;
    case MessageType.Command2: return MessageType.Command2;
    default: return undefined;
  }
}
