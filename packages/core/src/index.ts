export * from "./types/config.js";
export * from "./types/keys.js";
export { Axis } from "./environment/axis.js";
export { Picture } from "./environment/picture.js";
export { parseConfig } from "./parser/config-parser.js";
export { buildPicture } from "./builder/picture-builder.js";
export { validatePicture } from "./validation.js";
