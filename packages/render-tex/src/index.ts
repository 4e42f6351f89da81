export { renderTex, renderStandalone } from "./render-tex.js";
export type { TexRenderOptions } from "./render-tex.js";
export { renderPicture } from "./renderers/picture-renderer.js";
export { renderAxis } from "./renderers/axis-renderer.js";
export {
  renderAxisContent,
  renderAxisKey,
  renderPictureKey,
  renderScaleMode,
} from "./renderers/key-renderer.js";
export { TexEnvironment } from "./tex-environment.js";
