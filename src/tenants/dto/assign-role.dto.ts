import { IsIn } from 'class-validator';
import { ROLES, Role } from '../../auth/roles';

export class AssignRoleDto {
  @IsIn(ROLES)
  role!: Role;
}
