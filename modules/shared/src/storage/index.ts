/**
 * Social Events API - Storage Module
 *
 * Exports all storage operations for the DynamoDB Single Table Design.
 *
 * @module storage
 */

export { ConditionFailedError } from './types';
export type {
    ItemKey,
    StoredItem,
    IndexName,
    WriteCondition,
    WriteOperation,
    PutOperation,
    UpdateOperation,
    DeleteOperation,
    CheckOperation,
    TableGateway,
    TableGatewayConfig,
} from './types';

export { Keys, IndexKeys, sortKey } from './keys';

export {
    getUser,
    getUserByEmail,
    createUser,
    updateUser,
} from './user-operations';

export type { NewUser } from './user-operations';

export {
    createGroup,
    getGroup,
    listGroups,
    updateGroup,
    getMembership,
    listMembers,
    listMembershipsOfUser,
    addMember,
    changeMemberRole,
    removeMember,
} from './group-operations';

export type { NewGroup, GroupChanges } from './group-operations';

export {
    createEvent,
    getEvent,
    listEvents,
    listGroupEvents,
    updateEvent,
    getOrganizer,
    listOrganizers,
    addOrganizer,
    removeOrganizer,
    getParticipant,
    listParticipants,
    addParticipant,
    updateParticipantStatus,
    removeParticipant,
} from './event-operations';

export type { NewEvent, EventChanges } from './event-operations';

export {
    createThread,
    getThread,
    listThreads,
    listMessages,
    postMessage,
    deleteThread,
} from './discussion-operations';

export type { ThreadScope, NewMessage } from './discussion-operations';

export {
    createAlbum,
    getAlbum,
    listAlbums,
    deleteAlbum,
    addPhoto,
    getPhoto,
    listPhotos,
    deletePhoto,
    addComment,
    getComment,
    listComments,
    deleteComment,
} from './media-operations';

export type { NewPhoto } from './media-operations';

export {
    createPoll,
    getPoll,
    listPolls,
    getPollStructure,
    updatePoll,
    deletePoll,
    addQuestion,
    addOption,
    castVotes,
} from './poll-operations';

export type {
    NewQuestion,
    VoteChoice,
    QuestionWithOptions,
    PollStructure,
    PollChanges,
} from './poll-operations';

export {
    createTicketType,
    getTicketType,
    listTicketTypes,
    updateTicketType,
    deleteTicketType,
    purchaseTicket,
    listTickets,
    TicketMessages,
} from './ticket-operations';

export type { NewTicketType, TicketTypeChanges, NewPurchase } from './ticket-operations';

export {
    createShoppingItem,
    getShoppingItem,
    listShoppingItems,
    updateShoppingItem,
    deleteShoppingItem,
    createCarpoolOffer,
    getCarpoolOffer,
    listCarpoolOffers,
    updateCarpoolOffer,
    deleteCarpoolOffer,
} from './addon-operations';

export type {
    NewShoppingItem,
    ShoppingItemChanges,
    NewCarpoolOffer,
    CarpoolOfferChanges,
} from './addon-operations';

export {
    collectEventKeys,
    collectGroupKeys,
    deleteEventCascade,
    deleteGroupCascade,
} from './cascade';
