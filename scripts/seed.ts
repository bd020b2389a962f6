import { User } from '../models/User';
import { Team } from '../models/Team';
import { LeaveRequest } from '../models/LeaveRequest';
import connectDB, { disconnectDB } from '../config/database';
import { MongoUserDirectory } from '../services/userDirectory';
import { MongoLeaveRequestRepository } from '../services/leaveRequestRepository';
import { LeaveRequestService } from '../services/leaveRequestService';

async function seedDatabase() {
  await connectDB();

  console.log('🌱 Starting database seed...');

  await User.deleteMany({});
  await Team.deleteMany({});
  await LeaveRequest.deleteMany({});
  console.log('🗑️  Cleared existing data');

  const admin = await new User({
    username: 'admin',
    email: 'admin@example.com',
    password: 'admin123',
    firstName: 'Ada',
    lastName: 'Admin',
    role: 'admin',
    department: 'Management',
  }).save();

  const devManager = await new User({
    username: 'devmanager',
    email: 'devmanager@example.com',
    password: 'manager123',
    firstName: 'Dana',
    lastName: 'Manager',
    role: 'dev_manager',
    department: 'Development',
  }).save();

  const teamLead = await new User({
    username: 'teamlead',
    email: 'teamlead@example.com',
    password: 'lead123',
    firstName: 'Tom',
    lastName: 'Lead',
    role: 'team_lead',
    department: 'Development',
    managerId: devManager._id,
  }).save();

  const developers = [];
  for (const name of ['alice', 'bob']) {
    developers.push(await new User({
      username: name,
      email: `${name}@example.com`,
      password: 'staff123',
      firstName: name[0].toUpperCase() + name.slice(1),
      role: 'developer',
      department: 'Development',
      managerId: teamLead._id,
    }).save());
  }

  const salesRep = await new User({
    username: 'carol',
    email: 'carol@example.com',
    password: 'staff123',
    firstName: 'Carol',
    role: 'sales_executive',
    department: 'Sales',
  }).save();

  console.log('👥 Created users:');
  console.log('   admin / admin123');
  console.log('   devmanager / manager123');
  console.log('   teamlead / lead123');
  console.log('   alice, bob, carol / staff123');

  await Team.create({
    name: 'Frontend Team',
    description: 'Web dashboards',
    department: 'Development',
    leadId: teamLead._id,
    members: [
      { userId: teamLead._id, role: 'team_lead' },
      ...developers.map((dev) => ({ userId: dev._id, role: 'developer' })),
    ],
  });
  console.log('🧑‍🤝‍🧑 Created team "Frontend Team" led by teamlead');

  const leaveService = new LeaveRequestService({
    repository: new MongoLeaveRequestRepository(),
    directory: new MongoUserDirectory(),
  });

  const aliceId = String(developers[0]._id);
  const sick = await leaveService.create(aliceId, {
    userId: aliceId,
    leaveType: 'sick',
    startDate: '2024-01-10',
    endDate: '2024-01-12',
    reason: 'Flu',
  });
  await leaveService.approveOrReject(sick.id, String(teamLead._id), 'team_lead', 'approved', 'Get well soon');

  const bobId = String(developers[1]._id);
  await leaveService.create(bobId, {
    userId: bobId,
    leaveType: 'vacation',
    startDate: '2024-03-04',
    endDate: '2024-03-08',
    reason: 'Family trip',
  });

  const carolId = String(salesRep._id);
  await leaveService.create(carolId, {
    userId: carolId,
    leaveType: 'personal',
    startDate: '2024-02-15',
    endDate: '2024-02-15',
  });

  console.log(`📝 Created sample leave requests (admin id ${String(admin._id)})`);
  console.log('✅ Seed complete');
}

seedDatabase()
  .then(() => disconnectDB())
  .catch((error) => {
    console.error('❌ Seed failed:', error);
    process.exit(1);
  });
