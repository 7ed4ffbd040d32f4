export { copyDirectory, copyFilePreservingMode } from "./copy.js";
export { readLastLine } from "./tail.js";
