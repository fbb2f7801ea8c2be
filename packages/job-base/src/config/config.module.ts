import { type FullConfig, loadConfig } from "@sheet-intake/core-config";
import { type DynamicModule, Global, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

/**
 * Runtime configuration shared by every job component.
 * Built once at startup and injected by reference.
 */
export type JobConfig = FullConfig;

export const JOB_CONFIG = "JOB_CONFIG";

export interface JobConfigOptions {
	envFilePath?: string;
	/** Fail startup when mailbox credentials are missing */
	strict?: boolean;
}

@Global()
@Module({})
export class JobConfigModule {
	static forRoot(options: JobConfigOptions = {}): DynamicModule {
		return {
			module: JobConfigModule,
			imports: [
				// Loads the .env file into process.env before the factory runs
				ConfigModule.forRoot({
					...(options.envFilePath && { envFilePath: options.envFilePath }),
					isGlobal: true,
				}),
			],
			providers: [
				{
					provide: JOB_CONFIG,
					useFactory: (): JobConfig =>
						loadConfig({ strict: options.strict ?? false }),
				},
			],
			exports: [JOB_CONFIG],
		};
	}
}
