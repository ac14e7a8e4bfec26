export {
  type Tokenizer,
  type TokenizerConfig,
  WordTokenizer,
  defaultTokenizer,
  padSequence,
  tokenizeLogicalForm,
} from "./text.js";
