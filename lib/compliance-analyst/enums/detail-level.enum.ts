export enum DetailLevelEnum {
  BASIC = 'Basic',
  STANDARD = 'Standard',
  COMPREHENSIVE = 'Comprehensive',
}

export function parseDetailLevel(value: unknown): DetailLevelEnum | undefined {
  return Object.values(DetailLevelEnum).find(level => level === value);
}
