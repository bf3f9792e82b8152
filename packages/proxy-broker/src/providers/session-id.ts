import { randomBytes } from 'node:crypto';

/**
 * Opaque session tokens: a fixed-width random prefix followed by a
 * per-instance sequence, so no two tokens from one generator collide.
 */
export class SessionIdGenerator {
  private sequence: number;

  constructor() {
    this.sequence = 0;
  }

  next(): string {
    this.sequence += 1;
    return `${randomBytes(4).toString('hex')}${this.sequence.toString(36)}`;
  }
}
