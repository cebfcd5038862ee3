import { ChannelRegistry } from '../../../src/config/channels';
import { ErrorType } from '../../../src/utils/error-handler';

describe('ChannelRegistry', () => {
  const registry = new ChannelRegistry({ '1': 'SME', retail: 'retail', blank: '  ' });

  it('should resolve the business unit of a known channel', () => {
    expect(registry.resolveBusinessUnit('1')).toBe('SME');
    expect(registry.resolveBusinessUnit('retail')).toBe('RETAIL');
  });

  it('should expose the raw channel setting', () => {
    expect(registry.getChannelSetting('1')).toEqual({ id: '1', postLoginBu: 'SME' });
    expect(registry.getChannelSetting('9')).toBeUndefined();
  });

  it('should raise CONFIGURATION_ERROR for an unknown channel', () => {
    expect(() => registry.resolveBusinessUnit('9')).toThrow('Cannot find channel with id 9');
    expect(() => registry.resolveBusinessUnit('9')).toThrow(expect.objectContaining({
      type: ErrorType.CONFIGURATION,
      statusCode: 404,
    }));
  });

  it('should raise CONFIGURATION_ERROR for a channel with a blank business unit', () => {
    expect(() => registry.resolveBusinessUnit('blank')).toThrow('Missing BU in channel with id blank');
  });
});
