import { Role } from '../roles';

export interface TokenPairDto {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
  /** Access token lifetime in seconds */
  expires_in: number;
}

export interface RegisterResponseDto {
  user_id: string;
  tenant_id: string | null;
}

export interface UserProfileDto {
  user_id: string;
  tenant_id: string | null;
  role: Role | null;
  email: string;
  full_name: string | null;
  is_active: boolean;
}

/** One tenant the caller belongs to; pass tenant_id to login to switch into it */
export interface MembershipDto {
  tenant_id: string;
  role: Role;
  created_at: string;
}

export interface MessageDto {
  message: string;
}
