import { PhpSwitchError } from './Errors';

export type ServiceStatus = 'started' | 'stopped' | 'none' | 'scheduled' | 'error' | 'unknown';

export interface BrewService {
  name: string;
  status: ServiceStatus;
  user?: string;
  file?: string;
}

export type ServiceAction = 'start' | 'stop';

export interface ServiceOperation {
  service: string;
  action: ServiceAction;
  succeeded: boolean;
  /** Set when the service was already in the requested state */
  skipped?: boolean;
  error?: PhpSwitchError;
}

export interface ServiceReport {
  succeeded: boolean;
  /** Auto-restart is disabled, nothing was touched */
  skipped: boolean;
  operations: ServiceOperation[];
  warnings: PhpSwitchError[];
}
