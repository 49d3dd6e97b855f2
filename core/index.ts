export { ReleaseCreationFailedError } from './errors/release-creation-failed-error'
export { PostProcessFailedError } from './errors/post-process-failed-error'
export { InvalidTagFormatError } from './errors/invalid-tag-format-error'
export { PipelineError, isPipelineError } from './errors/pipeline-error'
export { MissingTargetError } from './errors/missing-target-error'
export { UploadFailedError } from './errors/upload-failed-error'
export { BuildFailedError } from './errors/build-failed-error'
export { GitHubApiError } from './errors/github-api-error'
export { ConfigError } from './errors/config-error'
export { loadReleaseConfig } from './config/load-release-config'
export { resolveRepository } from './config/resolve-repository'
export { createGitHubClient } from './api/create-github-client'
export { selectToolchain } from './toolchain/select-toolchain'
export { resolveVersion } from './version/resolve-version'
export { planPipeline } from './pipeline/plan-pipeline'
export { runPipeline } from './pipeline/run-pipeline'
export { runBuild } from './build/run-build'

export type { PipelineErrorCode } from './errors/pipeline-error'
export type { RunPipelineOptions } from './pipeline/run-pipeline'
export type { PlatformOutcome } from '../types/platform-outcome'
export type { PipelineReport } from '../types/pipeline-report'
export type { ReleaseConfig } from '../types/release-config'
export type { ReleaseClient } from '../types/release-client'
export type { PipelineEvent } from '../types/pipeline-event'
export type { ToolchainPlan } from '../types/toolchain-plan'
export type { PlatformSpec } from '../types/platform-spec'
export type { BuildResult } from '../types/build-result'
