import type { Capability } from "../callbacks.js";
import type { NativeError } from "../errors.js";
import type { Group } from "./group-chat.js";

// --- Native side ---

export interface NativeGroup {
  getName(): Uint8Array;
  getID(): Uint8Array;
  getTrackedID(): number;
  getInitMessage(): Uint8Array;
  getCreatedNano(): number;
  getCreatedMS(): number;
  getMembership(): Uint8Array;
  serialize(): Uint8Array;
}

export interface NativeGroupRequest {
  callback(group: NativeGroup): void;
}

export interface NativeGroupChatProcessor {
  process(
    decryptedMessage: Uint8Array,
    message: Uint8Array,
    receptionId: Uint8Array,
    ephemeralId: number,
    roundId: number,
    roundUrl: string,
    err: unknown,
  ): void;
  string(): string;
}

export interface NativeGroupChat {
  makeGroup(
    membershipJson: Uint8Array,
    message: Uint8Array,
    name: Uint8Array,
  ): Promise<Uint8Array>;
  resendRequest(groupId: Uint8Array): Promise<Uint8Array>;
  joinGroup(trackedGroupId: number): void;
  leaveGroup(groupId: Uint8Array): void;
  send(groupId: Uint8Array, message: Uint8Array, tag: string): Promise<Uint8Array>;
  getGroups(): Uint8Array;
  getGroup(groupId: Uint8Array): NativeGroup;
  numGroups(): number;
}

export interface NativeGroupBindings {
  newGroupChat(
    e2eId: number,
    requestCb: NativeGroupRequest,
    processor: NativeGroupChatProcessor,
  ): NativeGroupChat;
}

// --- Host side ---

export type GroupRequest = Capability<"callback", [group: Group]>;

export interface GroupChatProcessor {
  process(
    decryptedMessage: Uint8Array,
    message: Uint8Array,
    receptionId: Uint8Array,
    ephemeralId: number,
    roundId: number,
    roundUrl: string,
    err: NativeError | null,
  ): void;
  string(): string;
}
