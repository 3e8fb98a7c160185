import { Injectable, Logger } from '@nestjs/common';
import { ModelServerStatus } from '@deskpilot/shared';
import { AgentConfigService } from '../config/agent-config.service';
import { AgentEventsService } from '../events/agent-events.service';
import { InferenceService } from '../inference/inference.service';

/**
 * Tracks whether the model server is reachable and reports transitions
 * through the event sink.
 */
@Injectable()
export class ModelServerMonitor {
  private readonly logger = new Logger(ModelServerMonitor.name);
  private current: ModelServerStatus = 'STANDBY';

  constructor(
    private readonly inference: InferenceService,
    private readonly events: AgentEventsService,
    private readonly config: AgentConfigService,
  ) {}

  get status(): ModelServerStatus {
    return this.current;
  }

  async ensureOnline(): Promise<boolean> {
    if (this.current === 'ONLINE' && (await this.inference.checkHealth())) {
      return true;
    }

    this.update('STARTING');
    const online = await this.inference.waitForServer(this.config.serverWaitMs);
    this.update(online ? 'ONLINE' : 'ERROR');
    return online;
  }

  private update(status: ModelServerStatus): void {
    if (status === this.current) {
      return;
    }
    this.logger.log(`Model server ${this.current} -> ${status}`);
    this.current = status;
    this.events.emitModelServer(status);
  }
}
