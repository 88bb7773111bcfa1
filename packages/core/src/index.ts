export { ConfigLoader, REPO_CONFIG_FILENAME } from './config/loader';
export type { ConfigOptions } from './config/loader';
export { VerificationLoop, checkArgs } from './harness/verification-loop';
export type { VerificationLoopInput } from './harness/verification-loop';
export { VerificationHarness } from './harness/harness';
export type { HarnessOptions } from './harness/harness';
export type { CheckRunner, ExampleCheck, HarnessReport } from './harness/types';
