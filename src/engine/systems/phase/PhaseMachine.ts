// ─────────────────────────────────────────────
//  Battle Phase FSM
//  scout → deploy → battle → ended, ended reachable from anywhere.
//  Operates on a battle draft; never regresses.
// ─────────────────────────────────────────────

import type { Battle, BattlePhase, EndReason } from '@/engine/data/types/Battle';
import type { BuildingTarget } from '@/engine/data/types/Building';
import { ContextQuery } from '@/engine/state/BattleContext';
import { Logger } from '@/engine/utils/Logger';

type TransitionMap = Record<BattlePhase, BattlePhase[]>;

const TRANSITIONS: TransitionMap = {
  scout:  ['deploy', 'ended'],
  deploy: ['battle', 'ended'],
  battle: ['ended'],
  ended:  [],
};

export const PhaseMachine = {
  canTransition(from: BattlePhase, to: BattlePhase): boolean {
    return TRANSITIONS[from].includes(to);
  },

  /** Attempt a transition; an invalid one is logged and ignored */
  transition(battle: Battle, next: BattlePhase): boolean {
    if (!PhaseMachine.canTransition(battle.phase, next)) {
      Logger.warn(`[PhaseMachine] Invalid transition: ${battle.phase} → ${next} (${battle.id})`);
      return false;
    }
    battle.phase = next;
    return true;
  },

  /**
   * Move a battle forward on a deploy call.
   * scout flips to deploy first; once anything is on the field, deploy flips to battle.
   */
  advanceOnDeploy(battle: Battle): void {
    if (battle.phase === 'scout') PhaseMachine.transition(battle, 'deploy');
    if (battle.phase === 'deploy' && (battle.troops.length > 0 || battle.spells.length > 0)) {
      PhaseMachine.transition(battle, 'battle');
    }
  },

  /** Only the wall clock can end a battle that has not started fighting */
  checkTimeout(battle: Battle, now: number): EndReason | null {
    return now >= battle.endsAt ? 'timeout' : null;
  },

  /**
   * Post-simulation triggers, in priority order after the timeout.
   * An empty layout counts as all destroyed.
   */
  checkCompletion(battle: Battle, buildings: readonly BuildingTarget[]): EndReason | null {
    if (ContextQuery.standingBuildings(buildings).length === 0) return 'all_destroyed';

    const armySpent =
      battle.troops.length > 0 &&
      ContextQuery.liveTroops(battle.troops).length === 0 &&
      Object.keys(battle.remainingTroops).length === 0;
    if (armySpent) return 'army_depleted';

    return null;
  },
};
