export {
  MountTableServiceTag,
  makeMountTableService,
  defaultMountListingConfig,
  MountListingFailed,
  MountListingUnavailable
} from "./MountTableService";
export type { MountTableService, MountTableError, MountListingConfig } from "./MountTableService";
