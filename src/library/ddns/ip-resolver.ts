import type {Context} from '../common.js';

export type IIPResolver = {
  readonly name: string;

  /**
   * Resolves the current public ip address, one lookup per call.
   */
  resolve(context: Context): Promise<string>;
};
