import { parseAbi } from 'viem';

/** On-ledger interface of the executor */
export const executorAbi = parseAbi([
  'struct TokenPull { address token; uint256 amount; }',
  'struct Approval { address token; address spender; uint256 amount; bool revokeAfter; }',
  'struct Call { address target; uint256 value; bytes data; address injectToken; uint256 injectOffset; }',
  'function execute(TokenPull[] pulls, Approval[] approvals, Call[] calls, address[] tokensToFlush) payable returns (bytes[] results)',
]);

/** Custom errors the executor reverts with */
export const executorErrorsAbi = parseAbi([
  'error BatchTooLarge(string kind, uint256 length, uint256 max)',
  'error DuplicateTokenInFlush(address token)',
  'error TokenPullFailed(address token, uint256 amount)',
  'error SpenderNotWhitelisted(address spender)',
  'error TokenApprovalFailed(address token, address spender, uint256 amount)',
  'error TargetNotWhitelisted(address target)',
  'error InvalidInjectionOffset(uint256 offset, uint256 length)',
  'error InvalidSelectorForInjection(bytes4 selector)',
  'error OffsetMismatchForSelector(bytes4 selector, uint256 declared, uint256 expected)',
  'error ZeroAmountNotAllowed()',
  'error BalanceQueryFailed(address token)',
  'error TokenFlushFailed(address token, uint256 amount)',
  'error NativeFlushFailed(uint256 amount)',
  'error ReentrantCall()',
  'error ExecutorPaused()',
  'error AlreadyPaused()',
  'error NotPaused()',
  'error ZeroAddress()',
]);
