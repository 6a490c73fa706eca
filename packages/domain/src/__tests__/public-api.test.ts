import { describe, it, expect } from 'vitest';

describe('Workspace Package Resolution', () => {
  it('should resolve the @facility-throughput/domain workspace package', async () => {
    const domainModule = await import('@facility-throughput/domain');

    expect(domainModule.Products).toBeDefined();
    expect(domainModule.Estimation.WORKING_HOURS_PER_DAY).toBe(8);
    expect(domainModule.Reporting.aggregateFacility).toBeTypeOf('function');
    expect(domainModule.Configuration.createFacilityConfigStore).toBeTypeOf('function');
    expect(domainModule.Simulation.FacilitySimulation).toBeTypeOf('function');
    expect(domainModule.Testing.createMockProductSpec).toBeTypeOf('function');
  });

  it('runs the configure-then-compute workflow through the public API', async () => {
    const { Configuration, Simulation } = await import('@facility-throughput/domain');
    const store = Configuration.createFacilityConfigStore(Configuration.defaultFacilityConfig());
    const simulation = new Simulation.FacilitySimulation(store, { random: () => 0.5 });

    simulation.generateQuantities({ min: 80, max: 250 });
    const report = simulation.generateReport();

    expect(report.totalQuantity).toBe(660);
    expect(report.sequences).toHaveLength(2);
  });
});
