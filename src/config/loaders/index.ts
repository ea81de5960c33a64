import { envLoader } from './env.loader';
import { Config } from '../types';

export { envLoader };

export function loader(): Config {
  return envLoader(process.env);
}
