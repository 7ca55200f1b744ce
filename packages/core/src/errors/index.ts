const DISABLE_STACKTRACE : boolean = true;

export class PwsealError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/** File missing, unreadable or unwritable. */
export class IOError                       extends PwsealError {}
/** Container shorter than its header, or the filename layer is malformed. */
export class FormatError                   extends PwsealError {}
/** Key-verification hash mismatch: wrong password or a modified header. */
export class WrongPasswordOrTamperedError  extends PwsealError {}
/** AEAD tag mismatch: ciphertext or embedded filename was modified. */
export class TamperedError                 extends PwsealError {}
export class PlaintextTooLargeError        extends PwsealError {}
export class KeyDerivationError            extends PwsealError {}
export class ConfigError                   extends PwsealError {}
