import type { RuntimeCompatibility } from '../../types/index.js';

export interface TierEntry {
  label: string;
  /** Lowest host version that can consume this label. */
  minHostVersion?: string;
}

export interface TierDefinition {
  name: string;
  /** Runtime levels the tier applies to; empty means every level. */
  compatibility: RuntimeCompatibility[];
  entries: TierEntry[];
}

// Highest priority first; labels are stored in normalized form.
export const PROFILE_TIERS: TierDefinition[] = [
  {
    name: 'framework',
    compatibility: ['legacy-runtime'],
    entries: [
      { label: 'net48', minHostVersion: '2021.2.0' },
      { label: 'net472' },
      { label: 'net471' },
      { label: 'net47' },
      { label: 'net462' },
      { label: 'net461' },
      { label: 'net46' },
      { label: 'net452' },
      { label: 'net451' },
      { label: 'net45' },
      { label: 'net403' },
      { label: 'net40' },
      { label: 'net4' },
      { label: 'net35-unity full v35' },
      { label: 'net35-unity subset v35' },
      { label: 'net35' },
      { label: 'net20' },
      { label: 'net11' }
    ]
  },
  {
    name: 'standard',
    compatibility: ['legacy-runtime', 'standard-runtime'],
    entries: [
      { label: 'netstandard21', minHostVersion: '2021.2.0' },
      { label: 'netstandard20' },
      { label: 'netstandard16' },
      { label: 'netstandard15' },
      { label: 'netstandard14' },
      { label: 'netstandard13' },
      { label: 'netstandard12' },
      { label: 'netstandard11' },
      { label: 'netstandard10' }
    ]
  }
];

export const DEFAULT_NATIVE_LABEL = 'unity';
