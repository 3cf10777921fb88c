import { Injectable } from '@nestjs/common';
import type { UserRole } from '@gridsearch/shared';
import { SpreadsheetRepository } from './spreadsheet.repository';

/** Role rules for spreadsheet mutations. The caller is always passed in. */
@Injectable()
export class SpreadsheetPermissionService {
  constructor(private readonly repo: SpreadsheetRepository) {}

  canUpload(roles: readonly UserRole[]): boolean {
    return roles.includes('ADMIN') || roles.includes('OPERATOR');
  }

  /** ADMIN may delete anything; OPERATOR only their own uploads */
  async canDelete(fileId: string, username: string, roles: readonly UserRole[]): Promise<boolean> {
    if (roles.includes('ADMIN')) return true;
    if (!roles.includes('OPERATOR')) return false;

    const file = await this.repo.findById(fileId);
    return file !== null && file.uploadedBy === username;
  }
}
