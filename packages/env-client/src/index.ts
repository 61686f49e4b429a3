export { TradingEnv, EnvError, type StepResult } from './TradingEnv';
