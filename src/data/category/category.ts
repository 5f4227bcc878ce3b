import { v4 as uuidv4 } from 'uuid';
import Decimal from 'decimal.js';
import { CATEGORY_GROUP_TYPES, CategoryData, CategoryGroupData, CategoryGroupType } from './types';
import { serializeDecimal, toDecimal } from '../../utils/decimal/decimal';

export const UNCATEGORIZED = 'Uncategorized';

/**
 * A budget category. Group membership decides whether its transactions count
 * as income, spending or transfers.
 */
export class Category {
  id: string;
  name: string;
  assigned: Decimal;
  order: number;
  groupId: string;
  groupType: CategoryGroupType;

  constructor(data: CategoryData, group: { id: string; type: CategoryGroupType }) {
    this.id = data.id || uuidv4();
    this.name = data.name;
    this.assigned = toDecimal(data.assigned ?? 0);
    this.order = data.order ?? 0;
    this.groupId = group.id;
    this.groupType = group.type;
  }

  serialize(): CategoryData {
    return {
      id: this.id,
      name: this.name,
      assigned: serializeDecimal(this.assigned),
      order: this.order,
    };
  }
}

export class CategoryGroup {
  id: string;
  name: string;
  type: CategoryGroupType;
  order: number;
  categories: Category[];

  constructor(data: CategoryGroupData) {
    this.id = data.id || uuidv4();
    this.name = data.name;
    const type = CATEGORY_GROUP_TYPES.find((t) => t === data.type);
    if (!type) {
      throw new Error(`Invalid category group type '${data.type}'`);
    }
    this.type = type;
    this.order = data.order ?? 0;
    this.categories = (data.categories ?? [])
      .map((category) => new Category(category, { id: this.id, type }))
      .sort((a, b) => a.order - b.order);
  }

  serialize(): CategoryGroupData {
    return {
      id: this.id,
      name: this.name,
      type: this.type,
      order: this.order,
      categories: this.categories.map((category) => category.serialize()),
    };
  }
}
