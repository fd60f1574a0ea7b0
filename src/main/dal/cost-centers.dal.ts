/**
 * Cost Centers Data Access Layer
 *
 * Cost centers group fuel spend by operation (rural, urban, maintenance...).
 *
 * @module main/dal/cost-centers
 * @security SEC-006: All queries use prepared statements
 */

import { ReferenceEntityDAL, type ReferenceEntity } from './base.dal';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export type CostCenterCategory = 'RURAL' | 'URBAN' | 'INSTALLATION' | 'MAINTENANCE' | 'ADMIN';

export interface CostCenter extends ReferenceEntity {
  cost_center_id: string;
  name: string;
  category: CostCenterCategory;
}

export interface CreateCostCenterData {
  cost_center_id?: string;
  name: string;
  category?: CostCenterCategory;
  active?: boolean;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('cost-centers-dal');

// ============================================================================
// Cost Centers DAL
// ============================================================================

export class CostCentersDAL extends ReferenceEntityDAL<CostCenter> {
  protected readonly tableName = 'cost_centers';
  protected readonly primaryKey = 'cost_center_id';
  protected readonly naturalKeyColumn = 'name';

  create(data: CreateCostCenterData): CostCenter {
    const costCenterId = data.cost_center_id || this.generateId();
    const now = this.now();

    // SEC-006: Parameterized query
    const stmt = this.db.prepare(`
      INSERT INTO cost_centers (cost_center_id, name, category, active, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      costCenterId,
      data.name.trim(),
      data.category || 'URBAN',
      data.active === false ? 0 : 1,
      now,
      now
    );

    log.info('Cost center created', { costCenterId, name: data.name });

    const created = this.findById(costCenterId);
    if (!created) {
      throw new Error(`Failed to retrieve created cost center: ${costCenterId}`);
    }
    return created;
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const costCentersDAL = new CostCentersDAL();
