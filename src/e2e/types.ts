// --- Native side ---

export interface NativeAuthCallbacks {
  request(
    contact: Uint8Array,
    receptionId: Uint8Array,
    ephemeralId: number,
    roundId: number,
  ): void;
  confirm(
    contact: Uint8Array,
    receptionId: Uint8Array,
    ephemeralId: number,
    roundId: number,
  ): void;
  reset(
    contact: Uint8Array,
    receptionId: Uint8Array,
    ephemeralId: number,
    roundId: number,
  ): void;
}

export interface NativeProcessor {
  process(
    message: Uint8Array,
    receptionId: Uint8Array,
    ephemeralId: number,
    roundId: number,
  ): void;
  string(): string;
}

export interface NativeListener {
  hear(item: Uint8Array): void;
  name(): string;
}

export interface NativeE2e {
  getID(): number;
  getContact(): Uint8Array;
  getUdAddressFromNdf(): string;
  getUdCertFromNdf(): Uint8Array;
  getUdContactFromNdf(): Uint8Array;
  getReceptionID(): Uint8Array;
  getAllPartnerIDs(): Uint8Array;
  payloadSize(): number;
  secondPartitionSize(): number;
  partitionSize(index: number): number;
  firstPartitionSize(): number;
  getHistoricalDHPrivkey(): Uint8Array;
  getHistoricalDHPubkey(): Uint8Array;
  hasAuthenticatedChannel(partnerId: Uint8Array): boolean;
  removeService(tag: string): void;
  sendE2E(
    messageType: number,
    recipientId: Uint8Array,
    payload: Uint8Array,
    e2eParams: Uint8Array,
  ): Promise<Uint8Array>;
  addService(tag: string, processor: NativeProcessor): void;
  registerListener(
    senderId: Uint8Array,
    messageType: number,
    listener: NativeListener,
  ): void;
  request(partnerContact: Uint8Array, factsListJson: Uint8Array): Promise<number>;
  confirm(partnerContact: Uint8Array): Promise<number>;
  reset(partnerContact: Uint8Array): Promise<number>;
  replayConfirm(partnerId: Uint8Array): Promise<number>;
  callAllReceivedRequests(): void;
  deleteRequest(partnerId: Uint8Array): void;
  deleteAllRequests(): void;
  deleteSentRequests(): void;
  deleteReceiveRequests(): void;
  getReceivedRequest(partnerId: Uint8Array): Uint8Array;
  verifyOwnership(
    receivedContact: Uint8Array,
    verifiedContact: Uint8Array,
    e2eId: number,
  ): boolean;
  addPartnerCallback(partnerId: Uint8Array, cb: NativeAuthCallbacks): void;
  deletePartnerCallback(partnerId: Uint8Array): void;
}

export interface NativeConnection {
  getID(): number;
  sendE2E(messageType: number, payload: Uint8Array): Promise<Uint8Array>;
  close(): void;
  getPartner(): Uint8Array;
  registerListener(messageType: number, listener: NativeListener): void;
}

export interface NativeAuthenticatedConnection extends NativeConnection {
  isAuthenticated(): boolean;
}

export interface NativeE2eBindings {
  login(
    cmixId: number,
    callbacks: NativeAuthCallbacks,
    identity: Uint8Array,
    e2eParams: Uint8Array,
  ): NativeE2e;
  loginEphemeral(
    cmixId: number,
    callbacks: NativeAuthCallbacks,
    identity: Uint8Array,
    e2eParams: Uint8Array,
  ): NativeE2e;
}

// --- Host side ---

export type AuthEventHandler = (
  contact: Uint8Array,
  receptionId: Uint8Array,
  ephemeralId: number,
  roundId: number,
) => void;

/** Auth event handlers; any of them may be left out. */
export interface AuthCallbacks {
  request?: AuthEventHandler;
  confirm?: AuthEventHandler;
  reset?: AuthEventHandler;
}

/** Receives messages for a registered service tag. */
export interface Processor {
  process(
    message: Uint8Array,
    receptionId: Uint8Array,
    ephemeralId: number,
    roundId: number,
  ): void;
  string(): string;
}

/** Receives messages of a registered type; `name` identifies it in logs. */
export interface Listener {
  hear(item: Uint8Array): void;
  name(): string;
}
