import type {
  AssistantOutcome,
  AssistantStore,
  ClassificationOutcome,
  ExecutionContext,
  Language,
  RateProvider,
  SpeechRecognizer,
  Utterance,
} from '../../types';
import { mIncompleteSlots, mIntentHit, mIntentMiss, mRecognitionFailure } from '../assistantMetrics';
import { CategoryDictionary, loadCategoryDictionary } from './categoryMatcher';
import { CommandTable, compileCommandTable } from './commandTable';
import { CommandDispatcher, defaultExecutors } from './dispatcher';
import { CommandDescription, IntentClassifier } from './intentClassifier';
import { formatMessage } from './messages';

export interface AssistantServiceOptions {
  store: AssistantStore;
  rates: RateProvider;
  table?: CommandTable;
  dictionary?: CategoryDictionary;
  now?: () => Date;
}

export interface SpeechInput {
  audio: Buffer;
  languageHint?: Language;
  timestamp: Date;
}

const debug = () => process.env.ASSISTANT_DEBUG === 'true';

/**
 * The command pipeline: normalize, classify, check slots, dispatch.
 * Every outcome is a value; only unexpected faults outside the executors throw.
 */
export class AssistantService {
  readonly classifier: IntentClassifier;
  private readonly dispatcher: CommandDispatcher;
  private readonly store: AssistantStore;
  private readonly now: () => Date;

  constructor(options: AssistantServiceOptions) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
    this.classifier = new IntentClassifier(options.table ?? compileCommandTable());
    this.dispatcher = new CommandDispatcher(defaultExecutors({
      store: options.store,
      rates: options.rates,
      dictionary: options.dictionary ?? loadCategoryDictionary(),
    }));
  }

  async context(userId: string, language: Language): Promise<ExecutionContext> {
    const settings = await this.store.settings.get(userId);
    return { userId, language, baseCurrency: settings.currency, now: this.now };
  }

  async parse(utterance: Utterance, userId: string): Promise<ClassificationOutcome> {
    const context = await this.context(userId, utterance.language);
    return this.classifier.classify(utterance, { baseCurrency: context.baseCurrency });
  }

  describeCommands(language: Language): CommandDescription[] {
    return this.classifier.describeCommands(language);
  }

  async handleUtterance(utterance: Utterance, userId: string): Promise<AssistantOutcome> {
    const language = utterance.language;
    if (!utterance.text.trim()) {
      mRecognitionFailure();
      return { kind: 'recognition_failed', message: formatMessage(language, 'recognition_failed') };
    }

    const context = await this.context(userId, language);
    const outcome = this.classifier.classify(utterance, { baseCurrency: context.baseCurrency });

    if (outcome.kind === 'no_intent') {
      mIntentMiss();
      if (debug()) console.log(`[ASSISTANT] no intent (${language}): "${utterance.text}"`);
      return { kind: 'no_intent', message: formatMessage(language, 'no_intent') };
    }
    if (outcome.kind === 'incomplete') {
      mIncompleteSlots();
      const slots = outcome.missing.map(slot => formatMessage(language, `slot_${slot}`)).join(', ');
      if (debug()) console.log(`[ASSISTANT] ${outcome.intent} missing ${outcome.missing.join(',')}: "${utterance.text}"`);
      return { kind: 'incomplete', intent: outcome.intent, missing: outcome.missing, message: formatMessage(language, 'incomplete', { slots }) };
    }

    const { command } = outcome;
    mIntentHit(command.intent);
    if (debug()) console.log(`[ASSISTANT] ${command.intent} conf=${command.confidence.toFixed(2)} pattern=${command.matchedPattern}`);
    const result = await this.dispatcher.dispatch(command, context);
    return { kind: 'executed', command, result };
  }

  async handleSpeech(recognizer: SpeechRecognizer, input: SpeechInput, userId: string): Promise<AssistantOutcome> {
    const transcription = await recognizer.transcribe(input.audio, input.languageHint);
    if (!transcription.ok) {
      mRecognitionFailure();
      console.warn(`[ASSISTANT] transcription failed: ${transcription.reason}`);
      const settings = await this.store.settings.get(userId);
      return { kind: 'recognition_failed', message: formatMessage(input.languageHint ?? settings.language, 'recognition_failed') };
    }
    return this.handleUtterance(
      { text: transcription.text, language: transcription.language, timestamp: input.timestamp, modality: 'voice' },
      userId,
    );
  }
}
