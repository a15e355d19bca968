export {
  MountServiceTag,
  makeMountService,
  buildMountArgs,
  defaultMountCommandConfig
} from "./MountService";
export type { MountService, MountOutcome, MountCommandConfig } from "./MountService";
