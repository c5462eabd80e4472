/**
 * @speech-relay/object-storage: where synthesized audio is kept.
 */

export { FileObjectStorage } from "./file-storage.js";
