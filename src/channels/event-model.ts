import { bindCapability, requireMethods } from "../callbacks.js";
import { copyBytes } from "../marshal.js";
import type {
  EventModel,
  EventModelBuilder,
  NativeEventModel,
  NativeEventModelBuilder,
} from "./types.js";

const EVENT_MODEL_METHODS = [
  "joinChannel",
  "leaveChannel",
  "receiveMessage",
  "receiveReply",
  "receiveReaction",
  "updateSentStatus",
] as const;

export function adaptEventModel(label: string, host: EventModel): NativeEventModel {
  const model = requireMethods(label, host, EVENT_MODEL_METHODS);
  return {
    joinChannel(channel) {
      model.joinChannel(channel);
    },
    leaveChannel(channelId) {
      model.leaveChannel(copyBytes(channelId));
    },
    receiveMessage(
      channelId,
      messageId,
      nickname,
      text,
      pubKey,
      dmToken,
      codeset,
      timestamp,
      lease,
      roundId,
      messageType,
      status,
      hidden,
    ) {
      return model.receiveMessage(
        copyBytes(channelId),
        copyBytes(messageId),
        nickname,
        text,
        copyBytes(pubKey),
        dmToken,
        codeset,
        timestamp,
        lease,
        roundId,
        messageType,
        status,
        hidden,
      );
    },
    receiveReply(
      channelId,
      messageId,
      reactionTo,
      nickname,
      text,
      pubKey,
      dmToken,
      codeset,
      timestamp,
      lease,
      roundId,
      messageType,
      status,
      hidden,
    ) {
      return model.receiveReply(
        copyBytes(channelId),
        copyBytes(messageId),
        copyBytes(reactionTo),
        nickname,
        text,
        copyBytes(pubKey),
        dmToken,
        codeset,
        timestamp,
        lease,
        roundId,
        messageType,
        status,
        hidden,
      );
    },
    receiveReaction(
      channelId,
      messageId,
      reactionTo,
      nickname,
      reaction,
      pubKey,
      dmToken,
      codeset,
      timestamp,
      lease,
      roundId,
      messageType,
      status,
      hidden,
    ) {
      return model.receiveReaction(
        copyBytes(channelId),
        copyBytes(messageId),
        copyBytes(reactionTo),
        nickname,
        reaction,
        copyBytes(pubKey),
        dmToken,
        codeset,
        timestamp,
        lease,
        roundId,
        messageType,
        status,
        hidden,
      );
    },
    updateSentStatus(uuid, messageId, timestamp, roundId, status) {
      model.updateSentStatus(uuid, copyBytes(messageId), timestamp, roundId, status);
    },
  };
}

/**
 * The native side calls `build` with its storage path; the model the host
 * builds there is checked for every method before it is handed back.
 */
export function adaptEventModelBuilder(
  label: string,
  host: EventModelBuilder,
): NativeEventModelBuilder {
  const build = bindCapability(label, host, "build");
  return {
    build(path) {
      return adaptEventModel(`${label}.build()`, build(path));
    },
  };
}
