import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

/** Body of POST /tenants and PATCH /tenants/:tenantId */
export class TenantNameDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;
}
