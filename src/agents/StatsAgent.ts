import type { CommitOutcome, MatchStats, TeamMatchStats } from '../domain/matchTypes';
import type { MatchSnapshot } from '../domain/simulationTypes';

const createTeamStats = (): TeamMatchStats => ({
  possessionSeconds: 0,
  passesAttempted: 0,
  shots: 0,
  tacklesAttempted: 0,
  tacklesWon: 0,
  clearances: 0
});

export class StatsAgent {
  private stats: MatchStats;

  constructor(teamIds: string[]) {
    const byTeam: Record<string, TeamMatchStats> = {};
    teamIds.forEach((id) => {
      byTeam[id] = createTeamStats();
    });

    this.stats = {
      byTeam,
      clockSeconds: 0
    };
  }

  step(state: MatchSnapshot, dt: number) {
    this.stats.clockSeconds = state.time;
    const owner = state.ball.ownerId === null ? undefined : state.players.find((p) => p.id === state.ball.ownerId);
    if (owner) {
      this.team(owner.teamId).possessionSeconds += dt;
    }
  }

  recordOutcomes(state: MatchSnapshot, outcomes: readonly CommitOutcome[]) {
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') continue;
      const actor = state.players.find((player) => player.id === outcome.event.playerId);
      if (!actor) continue;
      const team = this.team(actor.teamId);

      switch (outcome.event.type) {
        case 'request_pass':
        case 'pass_to':
          team.passesAttempted += 1;
          break;
        case 'shoot':
          team.shots += 1;
          break;
        case 'tackle':
          team.tacklesAttempted += 1;
          if (outcome.status === 'applied') team.tacklesWon += 1;
          break;
        case 'clear_ball':
          team.clearances += 1;
          break;
        case 'claim_ball':
          break;
      }
    }
  }

  getStats() {
    return this.stats;
  }

  private team(teamId: string) {
    let team = this.stats.byTeam[teamId];
    if (!team) {
      team = createTeamStats();
      this.stats.byTeam[teamId] = team;
    }
    return team;
  }
}
