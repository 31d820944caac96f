export {
  Suspension,
  suspend,
  done,
  driveSync,
  driveAsync,
  type Task,
  type SuspensionPoint,
  type DriverContext,
} from './task';
export {
  ExecAttempt,
  Sleep,
  CacheRead,
  CacheWrite,
  FanOut,
  type AttemptCalls,
  type SyncCall,
  type AsyncCall,
} from './suspensions';
