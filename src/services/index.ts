import {
    AnswerStore,
    ChapterCatalog,
    EntitlementProvider,
    LanguageModel,
    LanguagePreferences,
    NarrativeStore
} from '../types/services.js';
import { Language } from '../types/story.js';
import { AnswerAggregator } from './answerAggregator.js';
import { BookCompiler } from './bookCompiler.js';
import { ChapterNarrativeGate } from './chapterNarrativeGate.js';
import { ChapterResolver } from './chapterResolver.js';
import { ChapterSynthesizer } from './chapterSynthesizer.js';
import { PermissionGate } from './permissionGate.js';
import { PromptBuilder } from './promptBuilder.js';
import { QuestionnaireService } from './questionnaireService.js';
import { StoryService } from './storyService.js';
import { KeyedLock } from '../utils/keyedLock.js';

export interface StoryPorts {
    catalog: ChapterCatalog;
    answers: AnswerStore;
    narratives: NarrativeStore;
    entitlements: EntitlementProvider;
    preferences: LanguagePreferences;
    model: LanguageModel;
}

export interface ServiceOptions {
    llmTimeoutMs: number;
    // Questionnaire language for people who never chose one
    defaultLanguage: Language;
    promptsDir?: string;
}

export interface ServiceContainer {
    storyService: StoryService;
    questionnaireService: QuestionnaireService;
    entitlements: EntitlementProvider;
}

// Initialize services in dependency order
export function createServices(ports: StoryPorts, options: ServiceOptions): ServiceContainer {
    const locks = new KeyedLock();
    const aggregator = new AnswerAggregator(ports.catalog, ports.answers);
    const gate = new ChapterNarrativeGate(ports.narratives);
    const resolver = new ChapterResolver(ports.catalog, ports.preferences, options.defaultLanguage);
    const synthesizer = new ChapterSynthesizer(
        aggregator,
        new PromptBuilder(options.promptsDir),
        ports.model,
        ports.narratives,
        { timeoutMs: options.llmTimeoutMs }
    );
    const compiler = new BookCompiler(ports.catalog, gate, synthesizer, ports.narratives, locks);

    return {
        storyService: new StoryService({
            catalog: ports.catalog,
            store: ports.narratives,
            resolver,
            permissionGate: new PermissionGate(ports.entitlements),
            gate,
            synthesizer,
            compiler,
            locks
        }),
        questionnaireService: new QuestionnaireService(
            ports.catalog,
            ports.answers,
            aggregator,
            resolver,
            ports.preferences
        ),
        entitlements: ports.entitlements
    };
}
