import type { Capability } from "../callbacks.js";
import type { NativeError } from "../errors.js";

// --- Native side ---

export interface NativeUdNetworkStatus {
  udNetworkStatus(): number;
}

export interface NativeUdLookupCallback {
  callback(contact: Uint8Array, err: unknown): void;
}

export interface NativeUdSearchCallback {
  callback(contactListJson: Uint8Array, err: unknown): void;
}

export interface NativeUserDiscovery {
  getID(): number;
  getFacts(): Uint8Array;
  getContact(): Uint8Array;
  confirmFact(confirmationId: string, code: string): void;
  sendRegisterFact(factJson: Uint8Array): string;
  permanentDeleteAccount(factJson: Uint8Array): void;
  removeFact(factJson: Uint8Array): void;
}

export interface NativeUdBindings {
  newOrLoadUd(
    e2eId: number,
    follower: NativeUdNetworkStatus,
    username: string,
    registrationValidationSignature: Uint8Array,
    cert: Uint8Array,
    contactFile: Uint8Array,
    address: string,
  ): NativeUserDiscovery;
  newUdManagerFromBackup(
    e2eId: number,
    follower: NativeUdNetworkStatus,
    cert: Uint8Array,
    contactFile: Uint8Array,
    address: string,
  ): NativeUserDiscovery;
  lookupUD(
    e2eId: number,
    udContact: Uint8Array,
    cb: NativeUdLookupCallback,
    lookupId: Uint8Array,
    singleParams: Uint8Array,
  ): Promise<Uint8Array>;
  searchUD(
    e2eId: number,
    udContact: Uint8Array,
    cb: NativeUdSearchCallback,
    factListJson: Uint8Array,
    singleParams: Uint8Array,
  ): Promise<Uint8Array>;
}

// --- Host side ---

/** Reports the network follower status to user discovery. */
export type UdNetworkStatus = Capability<"udNetworkStatus", [], number>;

export type UdLookupCallback = Capability<
  "callback",
  [contact: Uint8Array, err: NativeError | null]
>;

export type UdSearchCallback = Capability<
  "callback",
  [contactListJson: Uint8Array, err: NativeError | null]
>;

export const FactType = {
  Username: 0,
  Email: 1,
  Phone: 2,
  Nickname: 3,
} as const;
