/**
 * Room Utilities
 *
 * Room membership for the job's room, backed by the LiveKit job context.
 * @module agent/room-utils
 */

import type { JobContext } from '@livekit/agents';
import { CallStateError } from '../core/exceptions.js';
import { getLogger } from '../core/logging.js';
import type { ParticipantLike, RoomMembership } from '../telephony/types.js';

const logger = getLogger('agent.room');

export class JobRoomMembership implements RoomMembership {
  private ctx: JobContext;

  constructor(ctx: JobContext) {
    this.ctx = ctx;
  }

  get roomName(): string {
    const name = this.ctx.room.name ?? this.ctx.job.room?.name;
    if (!name) {
      throw new CallStateError('Job has no room');
    }
    return name;
  }

  get localIdentity(): string {
    const identity = this.ctx.room.localParticipant?.identity;
    if (!identity) {
      throw new CallStateError('Agent is not connected to the room', this.roomName);
    }
    return identity;
  }

  async waitForParticipant(identity: string): Promise<ParticipantLike> {
    logger.debug('Waiting for participant', { roomName: this.roomName, identity });
    const participant = await this.ctx.waitForParticipant(identity);
    logger.info('Participant joined', { roomName: this.roomName, identity: participant.identity });
    return participant;
  }
}
