import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { filter, Observable, Subject } from 'rxjs';
import { IngestionEvent } from '../../utils/types';

/** Hot stream of document status transitions. Late subscribers see only later events. */
@Injectable()
export class IngestionEventsService implements OnModuleDestroy {
    private readonly subject = new Subject<IngestionEvent>();
    readonly events$: Observable<IngestionEvent> = this.subject.asObservable();

    publish(event: IngestionEvent): void {
        this.subject.next(event);
    }

    forDocument(documentId: string): Observable<IngestionEvent> {
        return this.events$.pipe(filter(event => event.documentId === documentId));
    }

    onModuleDestroy(): void {
        this.subject.complete();
    }
}
