import { DynamicModule, Module } from '@nestjs/common';
import { ApplicationModule } from './application/application.module';
import { ConfigModule } from './config/config.module';
import { AppConfig } from './config/configuration';
import { LoggingModule } from './shared/logging/logging.module';

/**
 * Application Module
 * One-shot backup run; no HTTP server, no queue consumers
 */
@Module({})
export class AppModule {
  static forRoot(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [ConfigModule.forRoot(config), LoggingModule, ApplicationModule],
    };
  }
}
