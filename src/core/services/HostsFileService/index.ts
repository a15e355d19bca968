export {
  HostsFileServiceTag,
  HostsFileServiceLive,
  HostsFileNotFound,
  HostsFilePermissionDenied,
  HostsFileUnreadable
} from "./HostsFileService";
export type { HostsFileService, HostsFileError } from "./HostsFileService";
