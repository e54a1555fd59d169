import { bindCapability, requireMethods } from "../callbacks.js";
import { copyBytes } from "../marshal.js";
import type {
  DMReceiver,
  DMReceiverBuilder,
  DmNotificationUpdate,
  NativeDMReceiver,
  NativeDMReceiverBuilder,
  NativeDmNotificationUpdate,
} from "./types.js";

const RECEIVER_METHODS = [
  "receive",
  "receiveText",
  "receiveReply",
  "receiveReaction",
  "updateSentStatus",
  "deleteMessage",
  "getConversation",
  "getConversations",
] as const;

/** Each native method forwards to the host method of the same name. */
export function adaptDMReceiver(label: string, host: DMReceiver): NativeDMReceiver {
  const receiver = requireMethods(label, host, RECEIVER_METHODS);
  return {
    receive(
      messageId,
      nickname,
      text,
      partnerKey,
      senderKey,
      dmToken,
      codeset,
      timestamp,
      roundId,
      messageType,
      status,
    ) {
      return receiver.receive(
        copyBytes(messageId),
        nickname,
        copyBytes(text),
        copyBytes(partnerKey),
        copyBytes(senderKey),
        dmToken,
        codeset,
        timestamp,
        roundId,
        messageType,
        status,
      );
    },
    receiveText(
      messageId,
      nickname,
      text,
      partnerKey,
      senderKey,
      dmToken,
      codeset,
      timestamp,
      roundId,
      status,
    ) {
      return receiver.receiveText(
        copyBytes(messageId),
        nickname,
        text,
        copyBytes(partnerKey),
        copyBytes(senderKey),
        dmToken,
        codeset,
        timestamp,
        roundId,
        status,
      );
    },
    receiveReply(
      messageId,
      reactionTo,
      nickname,
      text,
      partnerKey,
      senderKey,
      dmToken,
      codeset,
      timestamp,
      roundId,
      status,
    ) {
      return receiver.receiveReply(
        copyBytes(messageId),
        copyBytes(reactionTo),
        nickname,
        text,
        copyBytes(partnerKey),
        copyBytes(senderKey),
        dmToken,
        codeset,
        timestamp,
        roundId,
        status,
      );
    },
    receiveReaction(
      messageId,
      reactionTo,
      nickname,
      reaction,
      partnerKey,
      senderKey,
      dmToken,
      codeset,
      timestamp,
      roundId,
      status,
    ) {
      return receiver.receiveReaction(
        copyBytes(messageId),
        copyBytes(reactionTo),
        nickname,
        reaction,
        copyBytes(partnerKey),
        copyBytes(senderKey),
        dmToken,
        codeset,
        timestamp,
        roundId,
        status,
      );
    },
    updateSentStatus(uuid, messageId, timestamp, roundId, status) {
      receiver.updateSentStatus(uuid, copyBytes(messageId), timestamp, roundId, status);
    },
    deleteMessage(messageId, senderPubKey) {
      return receiver.deleteMessage(copyBytes(messageId), copyBytes(senderPubKey));
    },
    getConversation(senderPubKey) {
      return copyBytes(receiver.getConversation(copyBytes(senderPubKey)));
    },
    getConversations() {
      return copyBytes(receiver.getConversations());
    },
  };
}

export function adaptDMReceiverBuilder(
  label: string,
  host: DMReceiverBuilder,
): NativeDMReceiverBuilder {
  const build = bindCapability(label, host, "build");
  return {
    build(path) {
      return adaptDMReceiver(`${label}.build()`, build(path));
    },
  };
}

export function adaptNotificationUpdate(
  label: string,
  host: DmNotificationUpdate,
): NativeDmNotificationUpdate {
  const fn = bindCapability(label, host, "callback");
  return {
    callback(filter, changed, deleted) {
      fn(copyBytes(filter), copyBytes(changed), copyBytes(deleted));
    },
  };
}
