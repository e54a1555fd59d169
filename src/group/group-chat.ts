/**
 * Group chat: groups of E2E partners sharing one group key.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bindCapability, requireMethods } from "../callbacks.js";
import { bytesArg, copyBytes, intArg, stringArg } from "../marshal.js";
import type {
  GroupChatProcessor,
  GroupRequest,
  NativeGroup,
  NativeGroupChat,
  NativeGroupChatProcessor,
} from "./types.js";

export class Group implements EntryPoints<NativeGroup> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeGroup,
  ) {
    Object.freeze(this);
  }

  getName(): Uint8Array {
    return this._ctx.boundary.callBytes("Group.getName", () => this._native.getName());
  }

  getID(): Uint8Array {
    return this._ctx.boundary.callBytes("Group.getID", () => this._native.getID());
  }

  /** Handle to pass to `GroupChat.joinGroup`. */
  getTrackedID(): number {
    return this._ctx.boundary.call("Group.getTrackedID", () => this._native.getTrackedID());
  }

  getInitMessage(): Uint8Array {
    return this._ctx.boundary.callBytes("Group.getInitMessage", () =>
      this._native.getInitMessage(),
    );
  }

  getCreatedNano(): number {
    return this._ctx.boundary.call("Group.getCreatedNano", () =>
      this._native.getCreatedNano(),
    );
  }

  getCreatedMS(): number {
    return this._ctx.boundary.call("Group.getCreatedMS", () => this._native.getCreatedMS());
  }

  /** JSON list of members. */
  getMembership(): Uint8Array {
    return this._ctx.boundary.callBytes("Group.getMembership", () =>
      this._native.getMembership(),
    );
  }

  serialize(): Uint8Array {
    return this._ctx.boundary.callBytes("Group.serialize", () => this._native.serialize());
  }
}

function adaptGroupProcessor(
  ctx: BindingsContext,
  label: string,
  host: GroupChatProcessor,
): NativeGroupChatProcessor {
  const processor = requireMethods(label, host, ["process", "string"]);
  return {
    process(decrypted, message, receptionId, ephemeralId, roundId, roundUrl, err) {
      processor.process(
        copyBytes(decrypted),
        copyBytes(message),
        copyBytes(receptionId),
        ephemeralId,
        roundId,
        roundUrl,
        ctx.boundary.error(err),
      );
    },
    string() {
      return processor.string();
    },
  };
}

export class GroupChat implements EntryPoints<NativeGroupChat> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeGroupChat,
  ) {
    Object.freeze(this);
  }

  /**
   * Create a group with the members in `membershipJson` (a JSON list of
   * partner IDs) and invite them. Resolves to JSON of the group report.
   */
  async makeGroup(
    membershipJson: Uint8Array,
    message: Uint8Array,
    name: Uint8Array,
  ): Promise<Uint8Array> {
    const members = bytesArg("membershipJson", membershipJson);
    const msg = bytesArg("message", message);
    const n = bytesArg("name", name);
    return this._ctx.boundary.settleBytes("GroupChat.makeGroup", () =>
      this._native.makeGroup(members, msg, n),
    );
  }

  async resendRequest(groupId: Uint8Array): Promise<Uint8Array> {
    const id = bytesArg("groupId", groupId);
    return this._ctx.boundary.settleBytes("GroupChat.resendRequest", () =>
      this._native.resendRequest(id),
    );
  }

  /** Accept the invitation for the group with this tracked id. */
  joinGroup(trackedGroupId: number): void {
    const id = intArg("trackedGroupId", trackedGroupId);
    this._ctx.boundary.call("GroupChat.joinGroup", () => this._native.joinGroup(id));
  }

  leaveGroup(groupId: Uint8Array): void {
    const id = bytesArg("groupId", groupId);
    this._ctx.boundary.call("GroupChat.leaveGroup", () => this._native.leaveGroup(id));
  }

  /** Resolves to JSON of the group send report. */
  async send(groupId: Uint8Array, message: Uint8Array, tag: string): Promise<Uint8Array> {
    const id = bytesArg("groupId", groupId);
    const msg = bytesArg("message", message);
    const t = stringArg("tag", tag);
    return this._ctx.boundary.settleBytes("GroupChat.send", () =>
      this._native.send(id, msg, t),
    );
  }

  /** JSON list of group IDs. */
  getGroups(): Uint8Array {
    return this._ctx.boundary.callBytes("GroupChat.getGroups", () =>
      this._native.getGroups(),
    );
  }

  getGroup(groupId: Uint8Array): Group {
    const id = bytesArg("groupId", groupId);
    const native = this._ctx.boundary.call("GroupChat.getGroup", () =>
      this._native.getGroup(id),
    );
    return new Group(this._ctx, native);
  }

  numGroups(): number {
    return this._ctx.boundary.call("GroupChat.numGroups", () => this._native.numGroups());
  }
}

/**
 * @param requestCb - Called with each group invitation received.
 * @param processor - Receives group messages.
 */
export function newGroupChat(
  e2eId: number,
  requestCb: GroupRequest,
  processor: GroupChatProcessor,
  ctx: BindingsContext = ensureBindings(),
): GroupChat {
  const id = intArg("e2eId", e2eId);
  const onRequest = bindCapability("requestCb", requestCb, "callback");
  const adapted = adaptGroupProcessor(ctx, "processor", processor);
  const native = ctx.boundary.call("newGroupChat", () =>
    ctx.native.newGroupChat(
      id,
      { callback: (group) => onRequest(new Group(ctx, group)) },
      adapted,
    ),
  );
  return new GroupChat(ctx, native);
}
