import { ComputeRedistributionUseCase } from '@/modules/inventory/application/use-cases/compute-redistribution';
import { RedistributionRequestDto } from '@/modules/inventory/dto/redistribution-request.dto';
import {
  createConfigService,
  createMetricsMock,
  createSourceMock,
} from '../../../fixtures/inventory/ports';
import {
  buildSnapshot,
  saleRecord,
  stockRecord,
  storeRecord,
} from '../../../fixtures/inventory/snapshot';

describe('ComputeRedistributionUseCase', () => {
  const snapshot = buildSnapshot({
    stores: [storeRecord('O'), storeRecord('D')],
    sales: [saleRecord('D', 'X1', 2, 1)],
    stock: [stockRecord('O', 'X1', 10), stockRecord('D', 'X1', 1)],
  });

  it('returns suggestions and counts them as transfer rows', async () => {
    const metrics = createMetricsMock();
    const useCase = new ComputeRedistributionUseCase(
      createSourceMock(snapshot),
      metrics,
      createConfigService(),
    );

    const response = await useCase.execute({
      requestId: 'req-1',
      payload: Object.assign(new RedistributionRequestDto(), {
        asOf: '2024-05-20',
        originStore: 'O',
      }),
    });

    expect(response.suggestions.map((row) => [row.originStore, row.destinationStore, row.suggestedQuantity])).toEqual([
      ['O', 'D', 3],
    ]);
    expect(response.summary.suggestedUnits).toBe(3);
    expect(metrics.incrementRowsEmitted).toHaveBeenCalledWith({
      pipeline: 'redistribution',
      status: 'TRASLADO',
      count: 1,
    });
  });
});
