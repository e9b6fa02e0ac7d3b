/**
 * Dispatch Outbound Call Script
 *
 * Asks the LiveKit server to run the outbound caller agent in a fresh room.
 *
 * Usage:
 *   npm run call -- +15550100 [transferTo] [customerName] [appointmentTime]
 */

import { AgentDispatchClient } from 'livekit-server-sdk';
import { config } from '../src/core/config.js';
import { describeError, redactPhoneNumber } from '../src/core/logging.js';
import { parseDialInfo } from '../src/agent/job-metadata.js';
import { generateCallRoomName } from '../src/telephony/config.js';

async function dispatchOutboundCall(args: string[]): Promise<void> {
    const [phoneNumber, transferTo, customerName, appointmentTime] = args;

    // Same validation the agent applies to the job metadata
    const dialInfo = parseDialInfo(JSON.stringify({ phoneNumber, transferTo, customerName, appointmentTime }));
    const roomName = generateCallRoomName(dialInfo.phoneNumber);

    console.log('\n📞 Dispatching outbound call');
    console.log(`   To: ${redactPhoneNumber(dialInfo.phoneNumber)}`);
    console.log(`   Transfer to: ${dialInfo.transferTo ? redactPhoneNumber(dialInfo.transferTo) : '(none)'}`);
    console.log(`   Agent: ${config.agent.name}`);
    console.log(`   Room: ${roomName}\n`);

    const client = new AgentDispatchClient(config.livekit.url, config.livekit.apiKey, config.livekit.apiSecret);
    const dispatch = await client.createDispatch(roomName, config.agent.name, {
        metadata: JSON.stringify(dialInfo),
    });

    console.log('✅ Dispatch created');
    console.log(`   Dispatch ID: ${dispatch.id}\n`);
}

dispatchOutboundCall(process.argv.slice(2)).catch(error => {
    console.error(`\n❌ ERROR DISPATCHING CALL: ${describeError(error)}\n`);
    process.exit(1);
});
