import dotenv from 'dotenv';
import UserModel from '../models/userModel.js';
import { connectDB, disconnectDB } from '../config/database.js';
import { generateToken } from '../utils/tokenGenerator.js';
import { logger } from '../utils/logger.js';

dotenv.config();

// Development helper: registers a person and prints a bearer token for them.
// Usage: npm run token -- <personId> [--allow-llm]
async function issueToken(args: string[]) {
    const personId = args.find(arg => !arg.startsWith('--'));
    const allowLlm = args.includes('--allow-llm');
    const uri = process.env.MONGO_URI;
    const secret = process.env.JWT_SECRET;

    if (!personId) {
        throw new Error('Usage: issueToken <personId> [--allow-llm]');
    }
    if (!uri || !secret) {
        throw new Error('MONGO_URI and JWT_SECRET must be set');
    }

    await connectDB(uri);
    try {
        // Without --allow-llm an existing grant is left as it is
        const update = allowLlm
            ? { $set: { canUseLlm: true } }
            : { $setOnInsert: { canUseLlm: false } };
        await UserModel.updateOne({ personId }, update, { upsert: true });
        logger.info('Person registered', { personId, allowLlm });
        console.log(generateToken(personId, secret));
    } finally {
        await disconnectDB();
    }
}

issueToken(process.argv.slice(2)).catch(error => {
    logger.error('Failed to issue token', error);
    process.exitCode = 1;
});
