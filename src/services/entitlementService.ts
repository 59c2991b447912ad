import UserModel, { IUser } from '../models/userModel.js';
import { Principal } from '../types/story.js';
import { EntitlementProvider } from '../types/services.js';

export class MongoEntitlementProvider implements EntitlementProvider {
    async canUseGeneration(principal: Principal): Promise<boolean> {
        const user = await UserModel.findOne({ personId: principal.personId }).lean<IUser>().exec();
        return user?.canUseLlm === true;
    }

    async setGenerationAccess(personId: string, allowed: boolean): Promise<{ personId: string; canUseLlm: boolean } | null> {
        const user = await UserModel.findOneAndUpdate(
            { personId },
            { $set: { canUseLlm: allowed } },
            { new: true }
        ).lean<IUser>().exec();

        return user ? { personId: user.personId, canUseLlm: user.canUseLlm } : null;
    }
}
