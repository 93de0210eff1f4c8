/**
 * Unit Tests for the Metrics Exposition
 */

import { formatPrometheusMetrics } from '../../src/health/server';

describe('formatPrometheusMetrics', () => {
  const output = formatPrometheusMetrics({
    sessionsActive: 3,
    sessionsByPhase: { LOBBY: 1, IN_PROGRESS: 2 },
    playersConnected: 11,
    gamesFinished: 4,
    sessionsAborted: 0,
    uptime: 120,
  });
  const lines = output.split('\n');

  it('should emit one sample per phase', () => {
    expect(lines).toContain('clueless_sessions_by_phase{phase="LOBBY"} 1');
    expect(lines).toContain('clueless_sessions_by_phase{phase="IN_PROGRESS"} 2');
  });

  it('should emit the gauges and counters', () => {
    expect(lines).toContain('clueless_sessions_active 3');
    expect(lines).toContain('clueless_players_connected 11');
    expect(lines).toContain('clueless_games_finished_total 4');
    expect(lines).toContain('clueless_sessions_aborted_total 0');
    expect(lines).toContain('clueless_uptime_seconds 120');
  });

  it('should declare counter types', () => {
    expect(lines).toContain('# TYPE clueless_games_finished_total counter');
  });

  it('should start with the active sessions block', () => {
    expect(lines.slice(0, 4)).toEqual([
      '# HELP clueless_sessions_active Sessions currently held in memory',
      '# TYPE clueless_sessions_active gauge',
      'clueless_sessions_active 3',
      '',
    ]);
  });
});
