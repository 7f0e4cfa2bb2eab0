import { isBackendUnavailable } from '../../errors.js';
import { technicianSchema, type Technician } from '../../domain/entities.js';
import type { RelationalStore } from '../../stores/types.js';
import type { HealthMonitor } from '../health/monitor.js';

export class TechnicianDirectory {
  constructor(
    private readonly relational: RelationalStore,
    private readonly monitor: HealthMonitor
  ) {}

  async list(): Promise<Technician[]> {
    const technicians: Technician[] = [];
    try {
      for await (const row of this.relational.query('technician', {
        eq: { is_active: true },
        orderBy: { column: 'name', ascending: true },
      })) {
        technicians.push(technicianSchema.parse(row));
      }
    } catch (error) {
      if (isBackendUnavailable(error, 'relational')) this.monitor.report('relational', false);
      throw error;
    }
    return technicians;
  }

  async get(id: string): Promise<Technician | null> {
    try {
      const row = await this.relational.read('technician', id);
      return row && row.deleted_at === null ? technicianSchema.parse(row) : null;
    } catch (error) {
      if (isBackendUnavailable(error, 'relational')) this.monitor.report('relational', false);
      throw error;
    }
  }
}
