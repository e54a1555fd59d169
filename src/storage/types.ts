export interface NativeDbCipher {
  encrypt(plaintext: Uint8Array): string;
  decrypt(ciphertext: string): Uint8Array;
  marshalJSON(): Uint8Array;
  unmarshalJSON(json: Uint8Array): void;
}

export interface NativeStorageBindings {
  newDatabaseCipher(
    cmixId: number,
    password: Uint8Array,
    plaintextBlockSize: number,
  ): NativeDbCipher;
  /** Throws when `password` does not match the stored one. */
  purge(storageDirectory: string, password: string): void;
}
