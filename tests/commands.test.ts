import { describe, expect, it, vi } from 'vitest';
import { NbeFunction } from '../src/constants/constants.js';
import {
  createSetCommandHandler,
  parseSetTopic,
  translatePowerCommand,
} from '../src/mqtt/commands.js';
import { defaultPrefix, joinTopic, topicMatches } from '../src/mqtt/topics.js';
import { parsePayload } from '../src/payload/payload.js';
import type { ResponseCallback, SettingWriter } from '../src/types/nbe-types.js';

describe('topics', () => {
  it('matches single-level and multi-level wildcards', () => {
    expect(topicMatches('nbe/1/set/+/+', 'nbe/1/set/boiler/temp')).toBe(true);
    expect(topicMatches('nbe/1/set/+/+', 'nbe/1/set/boiler')).toBe(false);
    expect(topicMatches('nbe/1/set/+/+', 'nbe/1/set/boiler/temp/x')).toBe(false);
    expect(topicMatches('nbe/#', 'nbe/1/set/boiler/temp')).toBe(true);
    expect(topicMatches('nbe/1/state', 'nbe/2/state')).toBe(false);
  });

  it('joins non-empty levels', () => {
    expect(joinTopic('nbe/12345', 'boiler/temp')).toBe('nbe/12345/boiler/temp');
    expect(joinTopic('', 'device/status')).toBe('device/status');
    expect(defaultPrefix('12345')).toBe('nbe/12345');
  });
});

describe('parseSetTopic', () => {
  it('takes the last two levels', () => {
    expect(parseSetTopic('nbe/12345/set/boiler/temp')).toBe('boiler.temp');
    expect(parseSetTopic('set/misc/start')).toBe('misc.start');
  });

  it('needs at least two levels', () => {
    expect(parseSetTopic('temp')).toBeNull();
  });
});

describe('translatePowerCommand', () => {
  it('turns the power switch into start and stop writes', () => {
    expect(translatePowerCommand('device.power_switch', 'ON')).toEqual({
      key: 'misc.start',
      value: '1',
    });
    expect(translatePowerCommand('device.power_switch', '1')).toEqual({
      key: 'misc.start',
      value: '1',
    });
    expect(translatePowerCommand('device.power_switch', 'OFF')).toEqual({
      key: 'misc.stop',
      value: '1',
    });
    expect(translatePowerCommand('device.power_switch', 'on')).toEqual({
      key: 'misc.stop',
      value: '1',
    });
  });

  it('passes other settings through', () => {
    expect(translatePowerCommand('boiler.temp', '70')).toEqual({ key: 'boiler.temp', value: '70' });
  });
});

class RecordingWriter implements SettingWriter {
  public readonly writes: Array<{ path: string; value: string; callback: ResponseCallback }> = [];
  public failWith: Error | null = null;

  async setAsync(path: string, value: string, callback: ResponseCallback): Promise<number> {
    if (this.failWith) throw this.failWith;
    this.writes.push({ path, value, callback });
    return this.writes.length;
  }
}

describe('createSetCommandHandler', () => {
  it('writes the setting named by the topic', () => {
    const writer = new RecordingWriter();
    const handler = createSetCommandHandler(writer);

    handler('nbe/12345/set/boiler/temp', '72');
    handler('nbe/12345/set/device/power_switch', 'OFF');

    expect(writer.writes.map(w => [w.path, w.value])).toEqual([
      ['boiler.temp', '72'],
      ['misc.stop', '1'],
    ]);
  });

  it('ignores topics it cannot map', () => {
    const writer = new RecordingWriter();
    createSetCommandHandler(writer)('temp', '1');
    expect(writer.writes).toHaveLength(0);
  });

  it('accepts any response without throwing', () => {
    const writer = new RecordingWriter();
    createSetCommandHandler(writer)('nbe/1/set/boiler/temp', '72');
    const write = writer.writes[0];
    if (!write) throw new Error('no write recorded');

    const base = { appId: 'A', controllerId: 'C', function: NbeFunction.SET_SETUP, seqNo: 1 };
    expect(() =>
      write.callback({ ...base, status: 0, payload: parsePayload('', NbeFunction.SET_SETUP) })
    ).not.toThrow();
    expect(() =>
      write.callback({
        ...base,
        status: 1,
        payload: parsePayload('error=Wrong PIN code', NbeFunction.SET_SETUP),
      })
    ).not.toThrow();
  });

  it('keeps write failures out of the MQTT client', async () => {
    const writer = new RecordingWriter();
    writer.failWith = new Error('socket closed');
    const spy = vi.spyOn(writer, 'setAsync');

    expect(() => createSetCommandHandler(writer)('nbe/1/set/boiler/temp', '72')).not.toThrow();
    expect(spy).toHaveBeenCalledWith('boiler.temp', '72', expect.any(Function));
    await expect(spy.mock.results[0]?.value).rejects.toThrow('socket closed');
  });
});
