export {
  StoreError,
  StoreIoError,
  PermissionDeniedError,
  NotFoundError,
  StoreClosedError,
  errnoCode,
  toStoreIoError,
  type IoOperation,
} from "./catalog.js";
