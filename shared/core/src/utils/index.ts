export { parseEnvInt, parseEnvBool, parseEnvList } from './env-utils';
