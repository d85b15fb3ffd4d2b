import type { NormalizedField } from './NormalizedField.js';

export interface User {
  readonly id: number;
  readonly organization_id?: number | null;
  readonly login?: string | null;
  readonly email?: string | null;
  readonly firstname?: string | null;
  readonly lastname?: string | null;
  readonly phone?: string | null;
  readonly mobile?: string | null;
  readonly web?: string | null;
  readonly department?: string | null;
  readonly vip?: boolean;
  readonly verified?: boolean;
  readonly active?: boolean;
  readonly note?: string | null;
  readonly last_login?: string | null;
  readonly out_of_office?: boolean;
  readonly created_by_id?: number | null;
  readonly updated_by_id?: number | null;
  readonly created_at: string;
  readonly updated_at: string;
  readonly organization: NormalizedField;
  readonly created_by: NormalizedField;
  readonly updated_by: NormalizedField;
}

export interface Organization {
  readonly id: number;
  readonly name: string;
  readonly shared?: boolean;
  readonly domain?: string | null;
  readonly domain_assignment?: boolean;
  readonly active?: boolean;
  readonly note?: string | null;
  readonly member_ids?: readonly number[];
  readonly created_by_id?: number | null;
  readonly updated_by_id?: number | null;
  readonly created_at: string;
  readonly updated_at: string;
  readonly created_by: NormalizedField;
  readonly updated_by: NormalizedField;
  readonly members?: readonly NormalizedField[];
}
