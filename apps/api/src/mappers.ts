import type { School } from '@schoolreg/domain';
import type { SchoolDto, SchoolVersionDto } from '@schoolreg/types';

export function toSchoolDto(school: School): SchoolDto {
  return {
    id: school.id,
    name: school.name,
    address: school.address,
    principalName: school.principalName,
    createdAt: school.createdAt.toISOString(),
    version: school.version,
  };
}

export function toSchoolVersionDto(school: School): SchoolVersionDto {
  return {
    ...toSchoolDto(school),
    validFrom: school.validFrom.toISOString(),
    validTo: school.validTo.toISOString(),
  };
}
