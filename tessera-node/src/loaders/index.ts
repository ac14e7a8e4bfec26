export { load as loadLines } from "./text.js";
