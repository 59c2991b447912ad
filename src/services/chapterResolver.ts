import { Chapter, LANGUAGES, Language } from '../types/story.js';
import { ChapterCatalog, LanguagePreferences } from '../types/services.js';
import { NotFoundError } from '../utils/errorHandler.js';

const hasLanguageSuffix = (chapterId: string): boolean =>
    LANGUAGES.some(language => chapterId.endsWith(`-${language}`));

// "3" in English is stored as "3-en"; ids that already carry a language stay as they are
export const normalizeChapterId = (chapterId: string, language: Language): string =>
    hasLanguageSuffix(chapterId) ? chapterId : `${chapterId}-${language}`;

/**
 * Maps the chapter ids callers send onto stored chapters in the person's
 * questionnaire language.
 */
export class ChapterResolver {
    constructor(
        private catalog: ChapterCatalog,
        private preferences: LanguagePreferences,
        private defaultLanguage: Language
    ) {}

    async languageFor(personId: string): Promise<Language> {
        return (await this.preferences.getLanguage(personId)) ?? this.defaultLanguage;
    }

    // An explicit request wins, then the signed-in person's preference
    async pickLanguage(requested: Language | undefined, personId: string | undefined): Promise<Language> {
        if (requested) return requested;
        return personId ? this.languageFor(personId) : this.defaultLanguage;
    }

    async resolve(chapterId: string, language: Language): Promise<Chapter> {
        const normalized = normalizeChapterId(chapterId, language);
        let chapter = await this.catalog.getChapter(normalized);
        // Catalogs may also key chapters without a language suffix
        if (!chapter && normalized !== chapterId) {
            chapter = await this.catalog.getChapter(chapterId);
        }
        if (!chapter) {
            throw new NotFoundError(`Chapter ${chapterId} not found`, { chapterId, language });
        }
        return chapter;
    }
}
