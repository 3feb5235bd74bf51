/**
 * Social Events API - Poll Entity Types
 *
 * A poll and everything it owns share one partition:
 *   - Poll:         PK=POLL#<id>  SK=METADATA   GSI1PK=EVENT#<event_id>#POLLS
 *   - Question:     PK=POLL#<id>  SK=QUESTION#<question_id>
 *   - Option:       PK=POLL#<id>  SK=OPTION#<question_id>#<option_id>
 *   - Option label: PK=POLL#<id>  SK=OPTION_LABEL#<question_id>#<label>
 *   - Vote:         PK=POLL#<id>  SK=VOTE#<question_id>#<user_id>
 *
 * The vote key holds one row per (question, voter); a later vote replaces it.
 */

import type { BaseItem } from './base';

export interface PollItem extends BaseItem {
    PK: `POLL#${string}`;
    SK: 'METADATA';
    GSI1PK: string;
    GSI1SK: string;
    entityType: 'POLL';

    pollId: string;
    eventId: string;
    title: string;
    isActive: boolean;
    createdById: string;
}

export interface PollQuestionItem extends BaseItem {
    PK: `POLL#${string}`;
    SK: `QUESTION#${string}`;
    entityType: 'POLL_QUESTION';

    pollId: string;
    questionId: string;
    question: string;
    position: number;
}

export interface PollOptionItem extends BaseItem {
    PK: `POLL#${string}`;
    SK: `OPTION#${string}`;
    entityType: 'POLL_OPTION';

    pollId: string;
    questionId: string;
    optionId: string;
    label: string;
    position: number;
}

export interface PollOptionLabelItem extends BaseItem {
    PK: `POLL#${string}`;
    SK: `OPTION_LABEL#${string}`;
    entityType: 'POLL_OPTION_LABEL';

    questionId: string;
    optionId: string;
}

export interface PollVoteItem extends BaseItem {
    PK: `POLL#${string}`;
    SK: `VOTE#${string}`;
    entityType: 'POLL_VOTE';

    pollId: string;
    questionId: string;
    optionId: string;
    userId: string;
}
