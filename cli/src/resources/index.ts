import { ResourceCommands } from '../commands/resource-commands';
import { actionItems } from './action-items';
import { commentReactions } from './comment-reactions';
import { customerMemberships } from './customer-memberships';
import { customers } from './customers';
import { memberships } from './memberships';
import { objectives } from './objectives';
import { projects } from './projects';
import { taggings } from './taggings';
import { tags } from './tags';
import { users } from './users';

// Registration order is the order commands appear in help output
export const RESOURCES: readonly ResourceCommands[] = [
  actionItems,
  commentReactions,
  customerMemberships,
  customers,
  memberships,
  objectives,
  projects,
  taggings,
  tags,
  users
];
