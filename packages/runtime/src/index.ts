export {
  writePidFile,
  readPidFile,
  removePidFile,
  checkRunningServer,
  isProcessAlive,
  pidFilePath,
  ServerMetadataSchema,
  type ServerMetadata,
} from "./pid.js";
