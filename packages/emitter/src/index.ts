/**
 * declmap emitter - standalone loader artifacts
 */

export * from "./constants.js";
export { relativePathFrom } from "./relative-path.js";
export { renderTable, renderTableJson } from "./table.js";
export {
  type LoaderSourceOptions,
  isValidClassName,
  loaderMarker,
  renderLoaderSource,
} from "./loader-source.js";
