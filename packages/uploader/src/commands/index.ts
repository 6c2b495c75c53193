export { registerDropCommand } from "./drop.js";
export { registerStatusCommand } from "./status.js";
export { registerUploadCommand } from "./upload.js";
