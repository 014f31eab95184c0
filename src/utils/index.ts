export { hashFile, sha256 } from "./hash.js";
export { toPosixPath } from "./paths.js";
