import { GenerationStateError } from '../../../src/engine/errors';
import { mapNativeGeneration, toTimestamp } from '../../../src/generations/mapping';

describe('mapNativeGeneration', () => {
  it('should map the id/timestamp spelling', () => {
    expect(mapNativeGeneration({ id: 12, timestamp: '2024-01-05 10:00:00', current: true, description: 'NixOS 24.05' })).toEqual({
      id: 12,
      timestamp: new Date(2024, 0, 5, 10, 0, 0),
      current: true,
      description: 'NixOS 24.05',
    });
  });

  it('should map the number/date spelling with defaults', () => {
    expect(mapNativeGeneration({ number: 3, date: 1_700_000_000 })).toEqual({
      id: 3,
      timestamp: new Date(1_700_000_000_000),
      current: false,
      description: null,
    });
  });

  it('should ignore fields it does not know', () => {
    const generation = mapNativeGeneration({ id: 1, timestamp: new Date(0), current: false, kernel: '6.6' });
    expect(Object.keys(generation)).toEqual(['id', 'timestamp', 'current', 'description']);
  });

  it('should reject records without an id', () => {
    expect(() => mapNativeGeneration({ timestamp: 1 })).toThrow('Generation record has no id');
  });

  it('should reject records without a timestamp', () => {
    expect(() => mapNativeGeneration({ id: 4 })).toThrow('Generation 4 has no timestamp');
  });

  it('should reject records of the wrong shape', () => {
    expect(() => mapNativeGeneration({ id: 'four', timestamp: 1 })).toThrow(GenerationStateError);
    expect(() => mapNativeGeneration(null)).toThrow(GenerationStateError);
  });
});

describe('toTimestamp', () => {
  it('should read nix-env dates as local time', () => {
    expect(toTimestamp('2024-02-01 09:30')).toEqual(new Date(2024, 1, 1, 9, 30, 0));
  });

  it('should reject unreadable dates', () => {
    expect(() => toTimestamp('yesterday')).toThrow('Unreadable generation timestamp: yesterday');
  });
});
