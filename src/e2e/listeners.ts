import { optionalMethods, requireMethods } from "../callbacks.js";
import { copyBytes } from "../marshal.js";
import type {
  AuthCallbacks,
  Listener,
  NativeAuthCallbacks,
  NativeListener,
  NativeProcessor,
  Processor,
} from "./types.js";

export function adaptListener(label: string, host: Listener): NativeListener {
  const listener = requireMethods(label, host, ["hear", "name"]);
  return {
    hear(item) {
      listener.hear(copyBytes(item));
    },
    name() {
      return listener.name();
    },
  };
}

export function adaptProcessor(label: string, host: Processor): NativeProcessor {
  const processor = requireMethods(label, host, ["process", "string"]);
  return {
    process(message, receptionId, ephemeralId, roundId) {
      processor.process(copyBytes(message), copyBytes(receptionId), ephemeralId, roundId);
    },
    string() {
      return processor.string();
    },
  };
}

/** Handlers the host left out are never invoked. */
export function adaptAuthCallbacks(
  label: string,
  host: AuthCallbacks,
): NativeAuthCallbacks {
  const callbacks = optionalMethods(label, host, ["request", "confirm", "reset"]);
  return {
    request(contact, receptionId, ephemeralId, roundId) {
      callbacks.request?.(copyBytes(contact), copyBytes(receptionId), ephemeralId, roundId);
    },
    confirm(contact, receptionId, ephemeralId, roundId) {
      callbacks.confirm?.(copyBytes(contact), copyBytes(receptionId), ephemeralId, roundId);
    },
    reset(contact, receptionId, ephemeralId, roundId) {
      callbacks.reset?.(copyBytes(contact), copyBytes(receptionId), ephemeralId, roundId);
    },
  };
}
