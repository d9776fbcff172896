import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';

// Use Cases
import {
  OrchestrateExportsUseCase,
  RelocateArtifactUseCase,
  SweepRetentionUseCase,
  RunBackupUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases
 *
 * Use cases depend on output ports (interfaces) but not on their implementations.
 * The implementations (adapters) are provided by the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [
    OrchestrateExportsUseCase,
    RelocateArtifactUseCase,
    SweepRetentionUseCase,
    RunBackupUseCase,
  ],
  exports: [
    // Export use cases so they can be used by driving adapters (CLI)
    OrchestrateExportsUseCase,
    RelocateArtifactUseCase,
    SweepRetentionUseCase,
    RunBackupUseCase,
  ],
})
export class ApplicationModule {}
