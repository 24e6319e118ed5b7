/**
 * Connection resolution
 *
 * Turns the module's signal registry into directed architecture edges.
 * Nodes that merely share a net name are wired driver -> receiver; when no
 * binding drives the net the nodes are chained in id order instead, which
 * keeps them visibly connected without claiming a direction.
 */

import { createComponentLogger } from '../../utils/logger';
import { SignalRegistry } from './signal-registry';
import { ResolvedConnection } from './types';

const logger = createComponentLogger('connection-resolver');

/**
 * Matches whole name tokens split on `_` and other separators, so `sys_clk`
 * and `rst_n` or `rstn` are ignored while `first_word` and `burst_len` are not.
 */
export function isIgnoredSignal(signal: string, ignoredSignals: readonly string[]): boolean {
  const tokens = signal.toLowerCase().split(/[^a-z0-9]+/);
  return ignoredSignals.some(pattern => {
    const lower = pattern.toLowerCase();
    return tokens.some(token => token === lower || token === `${lower}n`);
  });
}

function uniqueIds(ids: number[]): number[] {
  return [...new Set(ids)];
}

export function resolveConnections(
  registry: SignalRegistry,
  ignoredSignals: readonly string[]
): ResolvedConnection[] {
  const connections = new Map<string, ResolvedConnection>();
  let fallbackSignals = 0;

  const connect = (src: number, dst: number, signal: string) => {
    if (src === dst) return;
    const key = `${src}->${dst}`;
    const existing = connections.get(key);
    if (!existing) {
      connections.set(key, { src, dst, signals: [signal] });
    } else if (!existing.signals.includes(signal)) {
      existing.signals.push(signal);
    }
  };

  for (const signal of registry.signals()) {
    if (isIgnoredSignal(signal, ignoredSignals)) {
      continue;
    }

    const bindings = registry.bindings(signal);
    const drivers = uniqueIds(bindings.filter(b => b.direction === 'driver').map(b => b.nodeId));
    const receivers = uniqueIds(bindings.filter(b => b.direction !== 'driver').map(b => b.nodeId));

    if (drivers.length > 0 && receivers.length > 0) {
      for (const driver of drivers) {
        for (const receiver of receivers) {
          connect(driver, receiver, signal);
        }
      }
      continue;
    }

    if (drivers.length === 0) {
      const chained = uniqueIds(bindings.map(b => b.nodeId)).sort((a, b) => a - b);
      if (chained.length < 2) continue;
      fallbackSignals++;
      for (let i = 1; i < chained.length; i++) {
        connect(chained[i - 1], chained[i], signal);
      }
    }
  }

  const resolved = [...connections.values()];
  logger.debug('Resolved connections', {
    signals: registry.size,
    edges: resolved.length,
    fallbackSignals,
  });
  return resolved;
}
