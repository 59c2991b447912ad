import UserModel, { IUser } from '../models/userModel.js';
import { Language } from '../types/story.js';
import { LanguagePreferences } from '../types/services.js';

export class MongoLanguagePreferences implements LanguagePreferences {
    async getLanguage(personId: string): Promise<Language | null> {
        const user = await UserModel.findOne({ personId }).lean<IUser>().exec();
        return user?.language ?? null;
    }

    // Registers the person on first use; entitlement stays at its default
    async setLanguage(personId: string, language: Language): Promise<void> {
        await UserModel.updateOne({ personId }, { $set: { language } }, { upsert: true }).exec();
    }
}
