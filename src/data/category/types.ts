import { AmountValue } from '../../utils/decimal/decimal';

export const CATEGORY_GROUP_TYPES = ['income', 'expense', 'transfer'] as const;

export type CategoryGroupType = (typeof CATEGORY_GROUP_TYPES)[number];

export type CategoryData = {
  id?: string;
  name: string;
  // Budget for the reporting period
  assigned?: AmountValue;
  order?: number;
};

export type CategoryGroupData = {
  id?: string;
  name: string;
  type: CategoryGroupType;
  order?: number;
  categories?: CategoryData[];
};
