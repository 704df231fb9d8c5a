/**
 * Offline fundamentals for a handful of NSE names, used when no live source
 * answers. NMDC and WIPRO carry a dip-then-bounce price shape so an offline
 * scan still has recommendations to show.
 */

export interface RecoveryShape {
  /** Fraction of the series where the decline begins. */
  dipStartFraction: number;
  /** Decline from the pre-dip peak, as a fraction. */
  dipDepth: number;
  recoveryDays: number;
}

export interface SyntheticProfile {
  name: string | null;
  cmp: number;
  pe: number;
  roce: number;
  bv: number;
  debt: number;
  industry: string;
  recovery?: RecoveryShape;
}

export const SYNTHETIC_PROFILES: Readonly<Record<string, SyntheticProfile>> = {
  TCS: { name: 'Tata Consultancy Services', cmp: 3852.4, pe: 28.54, roce: 52.3, bv: 285.2, debt: 12000, industry: 'IT Services' },
  INFY: { name: 'Infosys Limited', cmp: 1523.75, pe: 25.18, roce: 36.82, bv: 220.45, debt: 3800, industry: 'IT Services' },
  NMDC: {
    name: 'NMDC Limited',
    cmp: 127.3,
    pe: 8.42,
    roce: 22.1,
    bv: 95.6,
    debt: 4200,
    industry: 'Mining & Minerals',
    recovery: { dipStartFraction: 0.78, dipDepth: 0.22, recoveryDays: 6 },
  },
  TECHM: { name: 'Tech Mahindra Limited', cmp: 1342.9, pe: 32.05, roce: 14.5, bv: 380.1, debt: 9100, industry: 'IT Services' },
  WIPRO: {
    name: 'Wipro Limited',
    cmp: 452.15,
    pe: 22.78,
    roce: 18.92,
    bv: 130.8,
    debt: 6200,
    industry: 'IT Services',
    recovery: { dipStartFraction: 0.82, dipDepth: 0.16, recoveryDays: 10 },
  },
};

export const DEFAULT_SYNTHETIC_PROFILE: SyntheticProfile = {
  name: null,
  cmp: 500,
  pe: 18,
  roce: 15,
  bv: 120,
  debt: 2500,
  industry: 'General',
};
