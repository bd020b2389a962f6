import mongoose from 'mongoose';

export interface ITeamMember {
  userId: mongoose.Types.ObjectId;
  role: string; // team_lead, developer, designer, ...
  joinedAt: Date;
}

export interface ITeam {
  name: string;
  description: string;
  department: string;
  leadId: mongoose.Types.ObjectId;
  members: ITeamMember[];
  createdAt: Date;
  updatedAt: Date;
}

const teamMemberSchema = new mongoose.Schema<ITeamMember>({
  userId: { type: mongoose.Schema.Types.ObjectId, ref: 'User', required: true },
  role: { type: String, trim: true, default: 'member' },
  joinedAt: { type: Date, default: () => new Date() },
}, { _id: false });

const teamSchema = new mongoose.Schema<ITeam>({
  name: { type: String, required: true, trim: true, unique: true },
  description: { type: String, trim: true, default: '' },
  department: { type: String, trim: true, required: true },
  leadId: { type: mongoose.Schema.Types.ObjectId, ref: 'User', required: true },
  members: { type: [teamMemberSchema], default: [] },
}, { timestamps: true });

teamSchema.index({ leadId: 1 });

export const Team = mongoose.model<ITeam>('Team', teamSchema);
