import type { StageHandler } from '@flowgate/core';
import { emailStage } from './email';
import { identificationStage } from './identification';

export { emailStage, emailTokenIdentifier, type EmailStageConfig } from './email';
export { identificationStage, type IdentificationStageConfig } from './identification';
export { configReader, type StageConfigReader } from './config';

/** Every built-in stage, for `StageRegistry.registerAll` */
export const builtinStages: StageHandler[] = [identificationStage, emailStage];
