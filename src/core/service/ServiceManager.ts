import { HomebrewClient } from '../brew/HomebrewClient';
import { ToolConfig } from '../../types/Config';
import {
  PhpSwitchError,
  ServiceOperationFailedError,
  ServiceOperationTimedOutError,
  errorMessage,
} from '../../types/Errors';
import {
  BrewService,
  ServiceAction,
  ServiceOperation,
  ServiceReport,
} from '../../types/Service';
import { FORMULA_FAMILY, VersionIdentifier, isDefaultVersion } from '../../types/Version';
import { logger } from '../../utils/Logger';

export interface ServiceManagerOptions {
  brew: HomebrewClient;
  config: Pick<ToolConfig, 'autoRestartService'>;
}

// replies from `brew services` that mean the service is already where we want it
const ALREADY_STOPPED = /not started|not running|already stopped|is not loaded|no such process/i;
const ALREADY_STARTED = /already started|already running/i;

const INACTIVE_STATUSES: ReadonlySet<BrewService['status']> = new Set(['stopped', 'none']);

const log = logger.child('service');

/**
 * PHP-FPM background services, one per installed formula. Every failure here
 * is reported as a warning: the version switch itself does not depend on it.
 */
export class ServiceManager {
  private readonly brew: HomebrewClient;
  private readonly config: Pick<ToolConfig, 'autoRestartService'>;

  constructor(options: ServiceManagerOptions) {
    this.brew = options.brew;
    this.config = options.config;
  }

  serviceNameFor(identifier: VersionIdentifier): string {
    return isDefaultVersion(identifier) ? FORMULA_FAMILY : identifier.formula;
  }

  async listServices(): Promise<BrewService[]> {
    return this.brew.listServices();
  }

  /**
   * Stops every running PHP service except the one belonging to `keep`.
   */
  async stopOthers(keep: VersionIdentifier): Promise<ServiceReport> {
    const report = ServiceManager.emptyReport();
    const keepName = this.serviceNameFor(keep);

    let services: BrewService[];
    try {
      services = await this.listServices();
    } catch (error) {
      report.warnings.push(new ServiceOperationFailedError('php services', 'list', errorMessage(error)));
      report.succeeded = false;
      return report;
    }

    for (const service of services) {
      if (service.name === keepName || INACTIVE_STATUSES.has(service.status)) {
        continue;
      }
      ServiceManager.record(report, await this.runAction('stop', service.name));
    }

    return report;
  }

  /**
   * Stops, then starts the service for `identifier`. A no-op success when
   * auto-restart is disabled.
   */
  async restart(identifier: VersionIdentifier): Promise<ServiceReport> {
    const report = ServiceManager.emptyReport();
    if (!this.config.autoRestartService) {
      report.skipped = true;
      return report;
    }

    const name = this.serviceNameFor(identifier);
    const stopped = await this.runAction('stop', name);
    ServiceManager.record(report, stopped);
    if (stopped.error instanceof ServiceOperationTimedOutError) {
      return report;
    }

    ServiceManager.record(report, await this.runAction('start', name));
    return report;
  }

  /**
   * Stops the service for `identifier`, tolerating one that is not running.
   */
  async stop(identifier: VersionIdentifier): Promise<ServiceOperation> {
    return this.runAction('stop', this.serviceNameFor(identifier));
  }

  /**
   * Leaves exactly the target's service running. Skipped entirely when
   * auto-restart is disabled.
   */
  async reconcile(identifier: VersionIdentifier): Promise<ServiceReport> {
    if (!this.config.autoRestartService) {
      log.debug('Auto-restart disabled, leaving PHP services alone');
      return { ...ServiceManager.emptyReport(), skipped: true };
    }

    const others = await this.stopOthers(identifier);
    const restarted = await this.restart(identifier);

    return {
      succeeded: others.succeeded && restarted.succeeded,
      skipped: false,
      operations: [...others.operations, ...restarted.operations],
      warnings: [...others.warnings, ...restarted.warnings],
    };
  }

  private async runAction(action: ServiceAction, service: string): Promise<ServiceOperation> {
    const result = await this.brew.serviceAction(action, service);

    if (result.timedOut) {
      return {
        service,
        action,
        succeeded: false,
        error: new ServiceOperationTimedOutError(service, action, this.brew.timeouts.service),
      };
    }

    if (result.exitCode === 0) {
      log.debug(`${action} ${service}: ok`);
      return { service, action, succeeded: true };
    }

    const output = `${result.stderr}\n${result.stdout}`.trim();
    const tolerated = action === 'stop' ? ALREADY_STOPPED : ALREADY_STARTED;
    if (tolerated.test(output)) {
      return { service, action, succeeded: true, skipped: true };
    }

    return {
      service,
      action,
      succeeded: false,
      error: new ServiceOperationFailedError(service, action, output.split('\n')[0] ?? ''),
    };
  }

  private static record(report: ServiceReport, operation: ServiceOperation): void {
    report.operations.push(operation);
    if (operation.error) {
      report.warnings.push(operation.error);
    }
    if (!operation.succeeded) {
      report.succeeded = false;
    }
  }

  private static emptyReport(): ServiceReport {
    const warnings: PhpSwitchError[] = [];
    return { succeeded: true, skipped: false, operations: [], warnings };
  }
}
