/**
 * Use Cases Barrel Export
 */
export { OrchestrateExportsUseCase } from './orchestrate-exports.use-case';
export { RelocateArtifactUseCase } from './relocate-artifact.use-case';
export { SweepRetentionUseCase } from './sweep-retention.use-case';
export { RunBackupUseCase } from './run-backup.use-case';
