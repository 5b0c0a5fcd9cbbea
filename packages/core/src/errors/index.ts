export {
  StoreError,
  NotFoundError,
  AmbiguousPathError,
  NotADirectoryError,
  InvalidMoveError,
  ParseError,
  IoError,
  WatchSetupError,
} from "./catalog.js";
