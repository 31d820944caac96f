export {
  DEFAULT_RETRY_POLICY,
  createRetryPolicy,
  computeDelay,
  backoffDelay,
  type RetryPolicy,
} from './policy';
export { RetryExecutor, type RetryExecutorOptions, type RetryOptions, type ExecuteOptions } from './executor';
