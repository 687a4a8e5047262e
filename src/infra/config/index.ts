export {
  EnvSchema,
  parseEnv,
  createConfig,
  DEFAULT_VACCINATIONS_CSV,
  DEFAULT_CODEBOOK_PATH,
  type Env,
  type AppConfig,
} from './env.js';
