import { User } from './user.entity';
import { Report } from './report.entity';
import { Network } from './network.entity';
import { Citation } from './citation.entity';
import { Edge } from './edge.entity';
import { EdgeVote } from './edge-vote.entity';
import { EdgeComment } from './edge-comment.entity';
import { Project } from './project.entity';
import { Query } from './query.entity';
import { Omic } from './omic.entity';
import { Experiment } from './experiment.entity';

/** All entity classes registered in this database library */
export const ENTITIES = [
  User,
  Report,
  Network,
  Citation,
  Edge,
  EdgeVote,
  EdgeComment,
  Project,
  Query,
  Omic,
  Experiment,
] as const;
