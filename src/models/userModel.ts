import mongoose, { Schema } from "mongoose";
import { LANGUAGES, Language } from "../types/story.js";

export interface IUser {
    personId: string;
    name?: string;
    email?: string;
    // Model calls cost money; off until an admin grants it
    canUseLlm: boolean;
    // Unset until the person picks one
    language?: Language;
    createdAt: Date;
}

const userSchema = new Schema<IUser>({
    personId: {
        type: String,
        required: true,
        unique: true,
        trim: true
    },
    name: { 
        type: String, 
        trim: true 
    },
    email: { 
        type: String, 
        lowercase: true,
        trim: true 
    },
    canUseLlm: {
        type: Boolean,
        default: false,
        required: true
    },
    language: {
        type: String,
        enum: [...LANGUAGES]
    },
    createdAt: { 
        type: Date, 
        default: Date.now 
    }
});

export default mongoose.model<IUser>('User', userSchema);
