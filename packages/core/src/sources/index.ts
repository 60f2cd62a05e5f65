/**
 * Sources Module
 *
 * Management endpoint sources.
 */

export type {
  SourceResult,
  ManagementSource,
  EndpointPaths,
  ActuatorSourceConfig,
} from './types.js';

export { createActuatorSource, describeFetchError } from './actuator.js';
