/**
 * @fileoverview Tests for SmartDeviceSelector scoring and selection
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { getConfigManager } from '../managers/ConfigManager';
import type { DiscoveredDevice, SmartDiscoveryResult } from '../types/printer';
import { DiscoveryLog, InMemoryConnectionHistory } from './ConnectionHistory';
import { SmartDeviceSelector, sortedPrinters } from './SmartDeviceSelector';
import type { SelectorContext } from './SmartDeviceSelector';

const generic: DiscoveredDevice = { address: '10.0.0.1', name: 'Generic Label Printer', transportType: 'network', status: 'found' };
const mobile: DiscoveredDevice = { address: '10.0.0.2', name: 'zq520 mobile', transportType: 'network', status: 'ready' };
const radio: DiscoveredDevice = { address: 'AC:3F:A4:00:00:01', name: 'RW420', transportType: 'radio', status: 'unknown' };

async function* batches(...lists: DiscoveredDevice[][]): AsyncGenerator<DiscoveredDevice[]> {
  for (const list of lists) {
    yield list;
  }
}

describe('SmartDeviceSelector', () => {
  let now: number;
  let context: SelectorContext;
  let selector: SmartDeviceSelector;

  beforeEach(() => {
    now = 5_000;
    context = { history: new InMemoryConnectionHistory(), discoveryLog: new DiscoveryLog(() => now) };
    selector = new SmartDeviceSelector(context);
  });

  describe('scoreDevices', () => {
    it('should break a score down by factor', () => {
      context.history.incrementSuccessCount(mobile.address);
      context.discoveryLog.record([mobile]);

      const [scored] = selector.scoreDevices([mobile]);

      expect(scored.breakdown).toEqual({ transport: 30, model: 22, history: 5, availability: 8, stability: 5 });
      expect(scored.score).toBe(70);
    });

    it('should favour the radio transport when network is not preferred', () => {
      const [scored] = selector.scoreDevices([radio], false);

      expect(scored.breakdown).toEqual({ transport: 30, model: 25, history: 0, availability: 3, stability: 0 });
    });

    it('should fall back to the generic model score', () => {
      const [scored] = selector.scoreDevices([generic]);
      expect(scored.breakdown.model).toBe(5);
    });

    it('should step the history score at 1, 3 and 5 connections', () => {
      const scores: number[] = [];
      for (let count = 0; count <= 5; count++) {
        scores.push(selector.scoreDevices([generic])[0].breakdown.history);
        context.history.incrementSuccessCount(generic.address);
      }
      expect(scores).toEqual([0, 5, 5, 10, 10, 15]);
    });
  });

  describe('selectOptimalPrinter', () => {
    it('should return null for no devices', () => {
      expect(selector.selectOptimalPrinter([])).toBeNull();
    });

    it('should rank a known mobile model above a generic device', () => {
      expect(selector.selectOptimalPrinter([generic, mobile])).toBe(mobile);
    });

    it('should keep the previously selected device while it is still reported', () => {
      expect(selector.selectOptimalPrinter([generic, mobile], { previouslySelected: generic })).toBe(generic);
    });

    it('should ignore a previous selection that disappeared', () => {
      expect(selector.selectOptimalPrinter([mobile], { previouslySelected: generic })).toBe(mobile);
    });

    it('should break ties by input order', () => {
      const twin: DiscoveredDevice = { ...generic, address: '10.0.0.9' };
      expect(selector.selectOptimalPrinter([twin, generic])).toBe(twin);
    });

    it('should follow the transport preference in a close ranking', () => {
      const radioDock: DiscoveredDevice = { address: 'AC:3F:A4:00:00:02', name: 'ZQ520', transportType: 'radio', status: 'unknown' };
      const networkDock: DiscoveredDevice = { address: '10.0.0.4', name: 'ZQ510', transportType: 'network', status: 'unknown' };

      expect(selector.selectOptimalPrinter([radioDock, networkDock], { preferNetwork: true })).toBe(networkDock);
      expect(selector.selectOptimalPrinter([radioDock, networkDock], { preferNetwork: false })).toBe(radioDock);
    });

    describe('with the process configuration', () => {
      afterEach(() => {
        getConfigManager().resetToDefaults();
      });

      it('should take the transport preference from PreferNetworkTransport', () => {
        const radioDock: DiscoveredDevice = { address: 'AC:3F:A4:00:00:02', name: 'ZQ520', transportType: 'radio', status: 'unknown' };
        const networkDock: DiscoveredDevice = { address: '10.0.0.4', name: 'ZQ510', transportType: 'network', status: 'unknown' };
        getConfigManager().set('PreferNetworkTransport', false);

        const configured = new SmartDeviceSelector(context);

        expect(configured.selectOptimalPrinter([radioDock, networkDock])).toBe(radioDock);
        expect(new SmartDeviceSelector(context, { preferNetwork: true }).selectOptimalPrinter([radioDock, networkDock])).toBe(networkDock);
      });
    });

    it('should let connection history overturn a close ranking', () => {
      const other: DiscoveredDevice = { ...mobile, address: '10.0.0.3', name: 'ZQ510' };
      for (let i = 0; i < 5; i++) {
        selector.recordSuccessfulConnection(other.address);
      }
      expect(selector.selectOptimalPrinter([mobile, other])).toBe(other);
    });
  });

  describe('smartDiscovery', () => {
    it('should yield on selection changes and once more when complete', async () => {
      const results: SmartDiscoveryResult[] = [];
      for await (const result of selector.smartDiscovery(batches([generic], [generic, mobile], [generic, mobile]))) {
        results.push(result);
      }

      expect(results.map(result => [result.selectedPrinter?.address, result.isComplete, result.allPrinters.length])).toEqual([
        ['10.0.0.1', false, 1],
        ['10.0.0.1', true, 2]
      ]);
    });

    it('should yield only the completion result for an empty run', async () => {
      const results: SmartDiscoveryResult[] = [];
      for await (const result of selector.smartDiscovery(batches())) {
        results.push(result);
      }

      expect(results).toEqual([{ selectedPrinter: null, allPrinters: [], isComplete: true, durationMs: 0 }]);
    });
  });

  it('should list the selection first in sortedPrinters', () => {
    const sorted = sortedPrinters({ selectedPrinter: mobile, allPrinters: [generic, mobile, radio], isComplete: true, durationMs: 0 });
    expect(sorted.map(device => device.address)).toEqual(['10.0.0.2', '10.0.0.1', 'AC:3F:A4:00:00:01']);
  });
});
