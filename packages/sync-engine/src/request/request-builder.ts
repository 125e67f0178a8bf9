/**
 * Request Builder
 *
 * Turns the active task into the next request document: queued local changes first (once per
 * task per session), then the paginated query. Every document is re-parsed before it is returned.
 */

import { silentLogger, type Logger } from '@ledgerlink/core';
import {
  buildRequest,
  type EntityDefinition,
  type EntityRegistry,
  type EnvelopeOptions,
  type RequestMessage,
  type XmlElement,
} from '@ledgerlink/qbxml';
import { planMutation, type MutationPlan } from '../diff/index.js';
import type { SnapshotStore } from '../snapshot/index.js';
import { isPlaceholderKey, type SnapshotDocument, type SyncTask } from '../types/index.js';

export interface BuiltRequest {
  kind: 'query' | 'mutation';
  xml: string;
  /** Mutation plans behind a mutation request, skipped ones included */
  plans: MutationPlan[];
}

export interface RequestBuilderOptions {
  registry: EntityRegistry;
  snapshots: SnapshotStore;
  envelope?: EnvelopeOptions;
  logger?: Logger;
}

export class RequestBuilder {
  private readonly logger: Logger;

  constructor(private readonly options: RequestBuilderOptions) {
    this.logger = options.logger ?? silentLogger();
  }

  async build(task: SyncTask): Promise<BuiltRequest> {
    const definition = this.options.registry.getOrThrow(task.entityType);

    if (definition.mutation && !task.mutationsSent && task.state === 'awaiting_first_page') {
      const doc = await this.options.snapshots.load(task.entityType);
      const plans = this.planMutations(definition, doc);
      const messages = this.mutationMessages(definition, task, plans);
      if (messages.length > 0) {
        const xml = await buildRequest(messages, this.options.envelope);
        return { kind: 'mutation', xml, plans };
      }
    }

    const xml = await buildRequest([this.queryMessage(definition, task)], this.options.envelope);
    return { kind: 'query', xml, plans: [] };
  }

  /**
   * `<Tag>QueryRq` for the task: a Start request with the task's filters, or a Continue
   * request carrying the iterator id and page size only
   */
  queryMessage(definition: EntityDefinition, task: SyncTask): RequestMessage {
    const tag = `${definition.tag}QueryRq`;
    const requestID = String(task.requestSeq);

    if (task.cursor) {
      return {
        tag,
        attributes: { requestID, iterator: 'Continue', iteratorID: task.cursor },
        body: { MaxReturned: String(task.params.maxReturned ?? definition.pageSize) },
      };
    }
    return {
      tag,
      attributes: { requestID, iterator: 'Start' },
      body: definition.buildQuery(task.params),
    };
  }

  private planMutations(definition: EntityDefinition, doc: SnapshotDocument): MutationPlan[] {
    const plans: MutationPlan[] = [];
    for (const [key, record] of Object.entries(doc.records)) {
      if (isPlaceholderKey(key)) plans.push(planMutation(definition, key, record, undefined));
    }
    for (const [id, edit] of Object.entries(doc.localEdits)) {
      plans.push(planMutation(definition, id, edit, doc.records[id]));
    }
    return plans;
  }

  private mutationMessages(
    definition: EntityDefinition,
    task: SyncTask,
    plans: MutationPlan[]
  ): RequestMessage[] {
    const mutation = definition.mutation;
    if (!mutation) return [];

    const messages: RequestMessage[] = [];
    for (const plan of plans) {
      const requestID = `${task.requestSeq}.${messages.length + 1}`;
      switch (plan.kind) {
        case 'add':
          messages.push({
            tag: `${definition.tag}AddRq`,
            attributes: { requestID },
            body: wrap(`${definition.tag}Add`, mutation.buildAdd(plan.record)),
          });
          break;
        case 'mod':
          messages.push({
            tag: `${definition.tag}ModRq`,
            attributes: { requestID },
            body: wrap(`${definition.tag}Mod`, mutation.buildMod(plan.id, plan.token, plan.changes)),
          });
          break;
        case 'skip':
          if (plan.reason === 'missing_token' || plan.reason === 'missing_record') {
            this.logger.warn('Local edit not pushed', {
              entityType: definition.tag,
              id: plan.key,
              reason: plan.reason,
            });
          }
          break;
      }
    }
    return messages;
  }
}

function wrap(name: string, element: XmlElement): XmlElement {
  const body: XmlElement = {};
  body[name] = element;
  return body;
}
