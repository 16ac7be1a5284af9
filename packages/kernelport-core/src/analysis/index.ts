export { collectIdentifiers } from "./identifiers.js";
