export {
  parseAnalyzeOptions,
  parseErrorsOptions,
  parseLanguagesOptions,
  parseCallOptions,
  parseRequest,
} from './cli-parser';
export { loadConfig, parseConfigText } from './config-loader';
