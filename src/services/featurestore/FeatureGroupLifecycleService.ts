/**
 * Feature group lifecycle: create, then poll describe until a terminal status.
 *
 * Statuses outside both the terminal and failure sets are transient. 'Absent' (describe
 * found nothing) is reported by name; deletion lists it as terminal, creation as failure.
 */

import { Logger } from '../core/Logger';
import { pollUntil, systemClock, PollBackoff, PollControl, PollingClock } from '../../utils/polling';
import { ResourceLifecycleError } from '../../types/FeatureStoreErrors';
import type { IFeatureGroupControlPlane } from './IFeatureStoreClients';
import type {
  FeatureGroupDefinition,
  ObservedFeatureGroupStatus,
  StatusWaitResult,
  StatusWaitSpec,
} from '../../types/FeatureStoreTypes';

export const DEFAULT_LIFECYCLE_POLL_INTERVAL_SECONDS = 5;

export const CREATION_FAILURE_STATUSES: readonly ObservedFeatureGroupStatus[] = [
  'CreateFailed',
  'Deleting',
  'DeleteFailed',
  'Absent',
];

export const DELETION_FAILURE_STATUSES: readonly ObservedFeatureGroupStatus[] = ['DeleteFailed'];

interface Observation {
  status: ObservedFeatureGroupStatus;
  failureReason?: string;
}

export class FeatureGroupLifecycleService {
  constructor(
    private readonly controlPlane: IFeatureGroupControlPlane,
    private readonly logger: Logger,
    private readonly pollIntervalSeconds: number = DEFAULT_LIFECYCLE_POLL_INTERVAL_SECONDS,
    private readonly clock: PollingClock = systemClock,
    private readonly backoff: PollBackoff = {}
  ) {}

  async awaitStatus(
    featureGroupName: string,
    spec: StatusWaitSpec,
    control?: PollControl
  ): Promise<StatusWaitResult> {
    const log = this.logger.child({ featureGroupName });
    const { value, polls } = await pollUntil<Observation>(
      `awaitStatus(${featureGroupName})`,
      async () => {
        const description = await this.controlPlane.describeFeatureGroup(featureGroupName);
        const observation: Observation = description
          ? { status: description.status, failureReason: description.failureReason }
          : { status: 'Absent' };
        log.debug('Feature group status', { status: observation.status });
        return observation;
      },
      (observation) =>
        spec.terminalStatuses.includes(observation.status) ||
        spec.failureStatuses.includes(observation.status),
      { ...this.backoff, intervalSeconds: spec.pollIntervalSeconds },
      control,
      this.clock
    );

    if (!spec.terminalStatuses.includes(value.status)) {
      log.error('Feature group reached failure status', {
        status: value.status,
        failureReason: value.failureReason,
        polls,
      });
      throw new ResourceLifecycleError(featureGroupName, value.status, value.failureReason);
    }

    log.info('Feature group reached terminal status', { status: value.status, polls });
    return { status: value.status, polls };
  }

  awaitCreation(featureGroupName: string, control?: PollControl): Promise<StatusWaitResult> {
    return this.awaitStatus(
      featureGroupName,
      {
        pollIntervalSeconds: this.pollIntervalSeconds,
        terminalStatuses: ['Created'],
        failureStatuses: CREATION_FAILURE_STATUSES,
      },
      control
    );
  }

  awaitDeletion(featureGroupName: string, control?: PollControl): Promise<StatusWaitResult> {
    return this.awaitStatus(
      featureGroupName,
      {
        pollIntervalSeconds: this.pollIntervalSeconds,
        terminalStatuses: ['Absent'],
        failureStatuses: DELETION_FAILURE_STATUSES,
      },
      control
    );
  }

  /**
   * Create a feature group (reusing an existing one of the same name) and wait until
   * it is Created.
   */
  async createFeatureGroup(
    definition: FeatureGroupDefinition,
    control?: PollControl
  ): Promise<StatusWaitResult> {
    const outcome = await this.controlPlane.createFeatureGroup(definition);
    this.logger.info('Waiting for feature group creation', {
      featureGroupName: definition.name,
      outcome: outcome.kind,
    });
    return this.awaitCreation(definition.name, control);
  }
}
