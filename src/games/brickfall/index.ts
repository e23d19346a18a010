import type { GameAPI, GameInstance, GameFactory } from '../../core/types';
import { BrickfallGame } from './BrickfallGame';

const factory: GameFactory = (container: HTMLElement, api: GameAPI): GameInstance => {
  return new BrickfallGame(container, api);
};

export default factory;
