import { DynBuf } from "../types";

export function createBuf(): DynBuf {
  return { data: Buffer.alloc(0), length: 0 };
}

export function bufPush(buffer: DynBuf, data: Buffer): void {
  const newLen = buffer.length + data.length;

  if (buffer.data.length < newLen) {
    let cap = Math.max(buffer.data.length, 32);

    while (cap < newLen) {
      cap *= 2;
    }

    const grown = Buffer.alloc(cap);
    buffer.data.copy(grown, 0, 0, buffer.length);
    buffer.data = grown;
  }

  data.copy(buffer.data, buffer.length, 0);
  buffer.length = newLen;
}

export function bufPop(buffer: DynBuf, length: number): void {
  buffer.data.copyWithin(0, length, buffer.length);
  buffer.length -= length;
}

export function bufView(buffer: DynBuf): Buffer {
  return buffer.data.subarray(0, buffer.length);
}

// copies out `length` bytes; the caller may keep the result across bufPush
export function bufTake(buffer: DynBuf, length: number): Buffer {
  const data = Buffer.from(buffer.data.subarray(0, length));
  bufPop(buffer, length);
  return data;
}
