export {
    Phraser,
    createNounPhraser,
    createVerbPhraser,
    NOUN_PHRASE_PATTERNS,
    VERB_PHRASE_PATTERNS,
} from './Phraser';
export type { Phrase } from './Phraser';
