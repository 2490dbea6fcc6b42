import { Request, Response } from 'express';
import { AllocationService } from '../services/allocation.service';
import {
  CreateAllocationRequest,
  CreateTextAllocationRequest,
} from '../validators/allocation.validator';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * Allocation Controller
 *
 * HTTP request handlers for allocation endpoints
 */
export class AllocationController {
  constructor(private allocationService: AllocationService) {}

  /**
   * POST /v1/allocations
   * Allocate stock to structured design records
   */
  createAllocation = asyncHandler(async (req: Request, res: Response) => {
    const { designs, stock }: CreateAllocationRequest['body'] = req.body;

    const report = this.allocationService.allocate({ designs, stock });

    res.status(200).json(createSuccessResponse(report));
  });

  /**
   * POST /v1/allocations/text
   * Allocate stock from text records
   */
  createTextAllocation = asyncHandler(async (req: Request, res: Response) => {
    const { designs, flowers }: CreateTextAllocationRequest['body'] = req.body;

    const report = this.allocationService.allocateText(designs, flowers);

    res.status(200).json(createSuccessResponse(report));
  });

  /**
   * GET /v1/allocations/sample
   * Run the bundled sample data set
   */
  getSampleAllocation = asyncHandler(async (_req: Request, res: Response) => {
    const report = this.allocationService.allocateSample();

    res.status(200).json(createSuccessResponse(report, 'Sample allocation'));
  });
}
