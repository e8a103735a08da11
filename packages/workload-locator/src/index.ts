export {
  orchestratorUserSchema,
  type FetchLike,
  type OrchestratorUser,
  type WorkloadLocation,
  type WorkloadNaming
} from './contracts';
export {err, locatorErrorCodeSchema, ok, type LocatorError, type LocatorErrorCode, type LocatorResult} from './errors';
export {
  createOrchestratorWorkloadLocator,
  type OrchestratorWorkloadLocatorOptions,
  type WorkloadLocator
} from './locator';
export {renderNameTemplate, toWorkloadUser} from './naming';
