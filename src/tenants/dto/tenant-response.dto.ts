import { Role } from '../../auth/roles';

export interface TenantDto {
  id: string;
  name: string;
  created_at: string;
}

export interface MemberDto {
  user_id: string;
  role: Role;
  created_at: string;
}
