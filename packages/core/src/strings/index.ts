export {
  split,
  tokenize,
  trim,
  join,
  startsWith,
  startsWithIgnoreCase,
  endsWith,
  endsWithIgnoreCase,
  equalsIgnoreCase,
  consumePrefix,
  consumeSuffix,
  stringReplace,
} from './strings.js'
