export { readFileToString, writeStringToFile } from './file.js'
