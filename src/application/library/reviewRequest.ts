import type { UserIdentity } from '../../domain/auth/user.js';
import {
  assertCanApprove,
  assertCanDeny,
  BorrowStatus,
  parseReviewAction,
  type BorrowRequest,
  type DenyPolicy,
  type ReviewAction,
} from '../../domain/library/borrowRequest.js';
import { BookAlreadyBorrowedError } from '../../domain/errors.js';
import type { Repositories, UnitOfWork } from '../ports.js';
import { ForbiddenError, NotFoundError } from '../errors.js';

export interface ReviewRequestCommand {
  actor: UserIdentity;
  requestId: number;
  /** Raw `action` query value; anything but approve/deny is rejected. */
  action: unknown;
}

export interface ReviewRequestResult {
  requestId: number;
  action: ReviewAction;
  status: BorrowStatus;
}

export class ReviewRequestUseCase {
  constructor(
    private uow: UnitOfWork,
    private denyPolicy: DenyPolicy = 'always'
  ) {}

  async execute(command: ReviewRequestCommand): Promise<ReviewRequestResult> {
    if (!command.actor.isAdmin) {
      throw new ForbiddenError();
    }

    return this.uow.run(async (repos) => {
      // Concurrent reviews of one request queue here and see each other's status
      const request = await repos.borrowRequests.findById(command.requestId, { forUpdate: true });
      if (!request) {
        throw new NotFoundError('Request not found');
      }

      const action = parseReviewAction(command.action);

      const status =
        action === 'approve'
          ? await this.approve(repos, request)
          : await this.deny(repos, request);

      return { requestId: request.id, action, status };
    });
  }

  private async approve(repos: Repositories, request: BorrowRequest): Promise<BorrowStatus> {
    assertCanApprove(request);

    // Serialise approvals for the same book before the overlap check
    await repos.books.findById(request.bookId, { forUpdate: true });

    const overlapping = await repos.borrowRequests.findApprovedOverlap(
      request.bookId,
      request.range,
      request.id
    );
    if (overlapping) {
      throw new BookAlreadyBorrowedError();
    }

    await repos.borrowRequests.updateStatus(request.id, BorrowStatus.Approved);
    await repos.books.decrementCopies(request.bookId);
    return BorrowStatus.Approved;
  }

  private async deny(repos: Repositories, request: BorrowRequest): Promise<BorrowStatus> {
    assertCanDeny(request, this.denyPolicy);
    await repos.borrowRequests.updateStatus(request.id, BorrowStatus.Denied);
    return BorrowStatus.Denied;
  }
}
