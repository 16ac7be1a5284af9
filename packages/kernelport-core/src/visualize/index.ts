export { astToDot } from "./dot.js";
