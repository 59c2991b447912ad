import { Answer, Chapter, ChapterNarrative, CompiledBook, Language, Principal, Question } from '../../types/story.js';
import {
    AnswerStore,
    ChapterCatalog,
    EntitlementProvider,
    LanguagePreferences,
    NarrativeStore
} from '../../types/services.js';

export class InMemoryCatalog implements ChapterCatalog {
    constructor(
        private chapters: Chapter[] = [],
        private questions: Question[] = []
    ) {}

    async listChapters(language: Language): Promise<Chapter[]> {
        return this.chapters
            .filter(chapter => chapter.language === language)
            .sort((a, b) => a.order - b.order);
    }

    async getChapter(chapterId: string): Promise<Chapter | null> {
        return this.chapters.find(chapter => chapter.id === chapterId) ?? null;
    }

    async getQuestions(chapterId: string): Promise<Question[]> {
        return this.questions
            .filter(question => question.chapterId === chapterId)
            .sort((a, b) => a.order - b.order);
    }
}

export class InMemoryAnswerStore implements AnswerStore {
    private answers = new Map<string, Answer>();

    async getAnswers(personId: string, chapterId: string): Promise<Answer[]> {
        return [...this.answers.values()].filter(
            answer => answer.personId === personId && answer.chapterId === chapterId
        );
    }

    async upsertAnswer(answer: Answer): Promise<{ answer: Answer; updated: boolean }> {
        const key = `${answer.personId}:${answer.questionId}`;
        const updated = this.answers.has(key);
        this.answers.set(key, { ...answer });
        return { answer: { ...answer }, updated };
    }
}

export class InMemoryNarrativeStore implements NarrativeStore {
    readonly narratives = new Map<string, ChapterNarrative>();
    readonly books = new Map<string, CompiledBook>();
    narrativeWrites = 0;
    bookWrites = 0;

    async getNarrative(personId: string, chapterId: string): Promise<ChapterNarrative | null> {
        const narrative = this.narratives.get(`${personId}:${chapterId}`);
        return narrative ? { ...narrative } : null;
    }

    async saveNarrative(narrative: ChapterNarrative): Promise<ChapterNarrative> {
        this.narrativeWrites++;
        this.narratives.set(`${narrative.personId}:${narrative.chapterId}`, { ...narrative });
        return { ...narrative };
    }

    async getBook(personId: string): Promise<CompiledBook | null> {
        const book = this.books.get(personId);
        return book ? { ...book } : null;
    }

    async saveBook(book: CompiledBook): Promise<CompiledBook> {
        this.bookWrites++;
        this.books.set(book.personId, { ...book });
        return { ...book };
    }
}

export class InMemoryEntitlements implements EntitlementProvider {
    private people = new Map<string, boolean>();

    constructor(allowed: string[] = [], denied: string[] = []) {
        allowed.forEach(personId => this.people.set(personId, true));
        denied.forEach(personId => this.people.set(personId, false));
    }

    async canUseGeneration(principal: Principal): Promise<boolean> {
        return this.people.get(principal.personId) === true;
    }

    async setGenerationAccess(personId: string, allowed: boolean): Promise<{ personId: string; canUseLlm: boolean } | null> {
        if (!this.people.has(personId)) return null;
        this.people.set(personId, allowed);
        return { personId, canUseLlm: allowed };
    }
}

export class InMemoryLanguagePreferences implements LanguagePreferences {
    readonly languages: Map<string, Language>;

    constructor(initial: Record<string, Language> = {}) {
        this.languages = new Map(Object.entries(initial));
    }

    async getLanguage(personId: string): Promise<Language | null> {
        return this.languages.get(personId) ?? null;
    }

    async setLanguage(personId: string, language: Language): Promise<void> {
        this.languages.set(personId, language);
    }
}
