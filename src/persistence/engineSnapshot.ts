import { StakingRewards } from '../stakingRewards';
import { InMemoryToken } from '../token';
import { EngineSnapshot } from './stateSerializer';

export function captureEngineSnapshot(engine: StakingRewards): EngineSnapshot {
  return {
    owner: engine.owner,
    address: engine.address,
    stakingToken: { symbol: engine.stakingToken.symbol, ledger: engine.stakingToken.snapshot() },
    rewardsToken: { symbol: engine.rewardsToken.symbol, ledger: engine.rewardsToken.snapshot() },
    sharedLedger: engine.stakingToken === engine.rewardsToken,
    state: engine.getState(),
  };
}

export interface RebuiltEngine {
  engine: StakingRewards;
  stakingToken: InMemoryToken;
  rewardsToken: InMemoryToken;
}

/**
 * Rebuild an engine and its ledgers from a snapshot. A shared ledger is
 * restored as one token instance; distinct ledgers stay distinct even when
 * their symbols match.
 */
export function rebuildEngine(snapshot: EngineSnapshot): RebuiltEngine {
  const stakingToken = new InMemoryToken(snapshot.stakingToken.symbol);
  stakingToken.restore(snapshot.stakingToken.ledger);

  let rewardsToken = stakingToken;
  if (!snapshot.sharedLedger) {
    rewardsToken = new InMemoryToken(snapshot.rewardsToken.symbol);
    rewardsToken.restore(snapshot.rewardsToken.ledger);
  }

  const engine = new StakingRewards({
    owner: snapshot.owner,
    address: snapshot.address,
    stakingToken,
    rewardsToken,
    initialState: snapshot.state,
  });

  return { engine, stakingToken, rewardsToken };
}
