export { base } from "./base.ts";
export {
  HOME_ENV_VAR,
  POWERSHELL_FILESYSTEM_PROVIDER,
  PathSegment,
  REGISTRY_ROOT,
} from "./path.ts";
export {
  type PathPlatform,
  platformFor,
  posixPaths,
  windowsPaths,
  windowsVolumeNameLength,
} from "./platform.ts";
export { Properties, type PropertyValues } from "./properties.ts";
export {
  type EnvironmentProbe,
  type GetwdResult,
  isPathStyle,
  PATH_STYLES,
  type PathStyle,
  PROPERTY_KEYS,
  type Property,
  type PropertyStore,
  type Segment,
} from "./types.ts";
