/**
 * GCM Message
 *
 * The JSON body POSTed to the GCM/FCM send endpoint, minus the recipient
 * field, which {@link GCMMessageStream} fills in per chunk.
 */

import { GCM_HIGH_PRIORITY, GCM_LOW_PRIORITY } from '../constants.js';

/**
 * Message text (delivered as `data.message`) or a data dictionary. A
 * dictionary's `notification` key becomes the notification payload.
 */
export type GCMMessageData = string | Record<string, unknown>;

export interface GCMMessageOptions {
  /** Display payload: `title`, `body`, `icon` and the like */
  notification?: Record<string, unknown>;
  /** Only the last message with this key is delivered once the device is reachable */
  collapseKey?: string;
  /** Hold the message until the device becomes active */
  delayWhileIdle?: boolean;
  /** Seconds to keep the message while the device is offline */
  timeToLive?: number;
  /** Only deliver to registration ids of this package */
  restrictedPackageName?: string;
  /** Send with `normal` instead of `high` priority */
  lowPriority?: boolean;
  /** Validate the request without delivering it */
  dryRun?: boolean;
}

export type GCMPriority = typeof GCM_HIGH_PRIORITY | typeof GCM_LOW_PRIORITY;

/**
 * Request body without its recipient field
 */
export interface GCMMessageBody {
  data: Record<string, unknown>;
  priority: GCMPriority;
  notification?: Record<string, unknown>;
  collapse_key?: string;
  delay_while_idle?: boolean;
  time_to_live?: number;
  restricted_package_name?: string;
  dry_run?: true;
}

/**
 * Full request body for one chunk
 */
export interface GCMRequestBody extends GCMMessageBody {
  to?: string;
  registration_ids?: string[];
}

export class GCMMessage {
  readonly registrationIds: readonly string[];
  readonly data: Record<string, unknown>;
  readonly notification: Record<string, unknown> | undefined;
  private readonly options: GCMMessageOptions;

  constructor(registrationIds: readonly string[], message: GCMMessageData, options: GCMMessageOptions = {}) {
    this.registrationIds = registrationIds;
    this.options = options;

    if (typeof message === 'string') {
      this.data = { message };
      this.notification = options.notification;
    } else {
      const { notification, ...data } = message;
      this.data = data;
      this.notification = isRecord(notification) ? notification : options.notification;
    }
  }

  get priority(): GCMPriority {
    return this.options.lowPriority ? GCM_LOW_PRIORITY : GCM_HIGH_PRIORITY;
  }

  /**
   * Request body with absent options left out.
   *
   * @example
   * new GCMMessage(['id'], 'Hi', { timeToLive: 60 }).toDict();
   * // { data: { message: 'Hi' }, priority: 'high', time_to_live: 60 }
   */
  toDict(): GCMMessageBody {
    const body: GCMMessageBody = {
      data: this.data,
      priority: this.priority,
    };

    if (this.notification !== undefined) {
      body.notification = this.notification;
    }
    if (this.options.collapseKey !== undefined) {
      body.collapse_key = this.options.collapseKey;
    }
    if (this.options.delayWhileIdle !== undefined) {
      body.delay_while_idle = this.options.delayWhileIdle;
    }
    if (this.options.timeToLive !== undefined) {
      body.time_to_live = this.options.timeToLive;
    }
    if (this.options.restrictedPackageName !== undefined) {
      body.restricted_package_name = this.options.restrictedPackageName;
    }
    if (this.options.dryRun) {
      body.dry_run = true;
    }
    return body;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
