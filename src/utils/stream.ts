import type { Readable } from "stream";
import { buffer } from "stream/consumers";

export async function readAll(stream: Readable): Promise<Buffer> {
  return buffer(stream);
}
