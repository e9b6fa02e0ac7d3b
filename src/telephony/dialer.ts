/**
 * LiveKit Dialer - outbound SIP legs and room control
 *
 * Handles:
 * - Creating SIP participants (places the phone call)
 * - Removing participants (agent leaving after a transfer)
 * - Deleting rooms (hangup for everyone)
 */

import { RoomServiceClient, SipClient } from 'livekit-server-sdk';
import { getLogger, redactPhoneNumber } from '../core/logging.js';
import { SipDialError } from '../core/exceptions.js';
import type { LivekitConfig } from '../core/config.js';
import type { DialRequest, DialingClient } from './types.js';

const logger = getLogger('telephony.dialer');

/**
 * Twirp reports a missing room/participant as `not_found` (HTTP 404)
 */
export function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? error.code : undefined;
  const status = 'status' in error ? error.status : undefined;
  return code === 'not_found' || status === 404;
}

export class LiveKitDialer implements DialingClient {
  private roomService: RoomServiceClient;
  private sipClient: SipClient;

  constructor(livekit: LivekitConfig) {
    this.roomService = new RoomServiceClient(livekit.url, livekit.apiKey, livekit.apiSecret);
    this.sipClient = new SipClient(livekit.url, livekit.apiKey, livekit.apiSecret);
  }

  /**
   * Place the call. With `waitUntilAnswered` the promise settles only once
   * the callee picks up or the attempt fails.
   */
  async createCall(request: DialRequest): Promise<void> {
    logger.info('Creating SIP participant', {
      roomName: request.roomName,
      trunkId: request.trunkId,
      phoneNumber: redactPhoneNumber(request.phoneNumber),
      participantIdentity: request.participantIdentity,
      waitUntilAnswered: request.waitUntilAnswered,
    });

    try {
      const sipParticipant = await this.sipClient.createSipParticipant(
        request.trunkId,
        request.phoneNumber,
        request.roomName,
        {
          participantIdentity: request.participantIdentity,
          participantName: request.participantName,
          waitUntilAnswered: request.waitUntilAnswered,
          ringingTimeout: request.ringingTimeoutSeconds,
        },
      );

      logger.info('SIP participant created', {
        roomName: request.roomName,
        participantIdentity: request.participantIdentity,
        sipCallId: sipParticipant.sipCallId,
      });
    } catch (error) {
      throw SipDialError.from(error);
    }
  }

  async removeParticipant(roomName: string, identity: string): Promise<void> {
    await this.roomService.removeParticipant(roomName, identity);
    logger.info('Participant removed', { roomName, identity });
  }

  /**
   * Delete the room. A room that is already gone counts as deleted.
   */
  async deleteRoom(roomName: string): Promise<void> {
    try {
      await this.roomService.deleteRoom(roomName);
      logger.info('Room deleted', { roomName });
    } catch (error) {
      if (isNotFoundError(error)) {
        logger.warning('Room already deleted', { roomName });
        return;
      }
      throw error;
    }
  }
}
