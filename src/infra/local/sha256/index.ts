import { createHash } from 'crypto';
import type { Sha256Port } from '../../../ports/sha256.port.js';

export class NodeSha256 implements Sha256Port {
  sha256(bytes: Uint8Array): Uint8Array {
    return new Uint8Array(createHash('sha256').update(bytes).digest());
  }
}
